/**
 * HTML and XML extractors
 * Markup is stripped with regular expressions; no DOM is built
 */

import { promises as fs } from 'node:fs';
import type { Extraction, Extractor } from './types.js';

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Decode named and numeric character references
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
    if (ref[0] === '#') {
      const code = ref[1].toLowerCase() === 'x' ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[ref.toLowerCase()] ?? match;
  });
}

/**
 * Strip tags, comments and CDATA markers, then collapse whitespace
 */
export function stripMarkup(markup: string): string {
  const text = markup
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, ' $1 ')
    .replace(/<\?[\s\S]*?\?>/g, ' ')
    .replace(/<!DOCTYPE[^>]*>/gi, ' ')
    .replace(/<[^>]+>/g, ' ');
  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

/**
 * Text content of an HTML document, without script and style blocks
 */
export function htmlToText(html: string): string {
  return stripMarkup(html.replace(/<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1>/gi, ' '));
}

const COUNTED_TAGS = ['p', 'div', 'a', 'img', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'table', 'tr', 'ul', 'ol', 'li', 'form'];

function readAttribute(tag: string, name: string): string | undefined {
  const match = tag.match(new RegExp(`\\b${name}\\s*=\\s*("([^"]*)"|'([^']*)')`, 'i'));
  return match ? (match[2] ?? match[3]) : undefined;
}

/**
 * Title, meta tags, element counts, links and images of an HTML document
 */
export function htmlMetadata(html: string): Record<string, unknown> {
  const metadata: Record<string, unknown> = { file_type: 'html' };

  const title = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  if (title) {
    metadata.title = stripMarkup(title[1]);
  }

  const metaTags: Record<string, string> = {};
  for (const tag of html.match(/<meta\b[^>]*>/gi) ?? []) {
    const name = readAttribute(tag, 'name') ?? readAttribute(tag, 'property') ?? readAttribute(tag, 'http-equiv');
    const content = readAttribute(tag, 'content');
    if (name && content) {
      metaTags[name] = content;
    }
  }
  if (Object.keys(metaTags).length > 0) {
    metadata.meta_tags = metaTags;
  }

  const tagCounts: Record<string, number> = {};
  for (const tag of COUNTED_TAGS) {
    const count = (html.match(new RegExp(`<${tag}\\b`, 'gi')) ?? []).length;
    if (count > 0) {
      tagCounts[tag] = count;
    }
  }
  metadata.tag_counts = tagCounts;

  const links = (html.match(/<a\b[^>]*>/gi) ?? [])
    .map((tag) => readAttribute(tag, 'href'))
    .filter((href): href is string => !!href && !href.startsWith('#'));
  if (links.length > 0) {
    metadata.links = links.slice(0, 20);
    metadata.link_count = links.length;
  }

  const images = (html.match(/<img\b[^>]*>/gi) ?? []).filter((tag) => readAttribute(tag, 'src'));
  if (images.length > 0) {
    metadata.image_count = images.length;
  }

  return metadata;
}

/**
 * Root element, element count and namespaces of an XML document
 */
export function xmlMetadata(xml: string): Record<string, unknown> {
  const openTags: string[] = xml.match(/<([A-Za-z_][\w.:-]*)(?=[\s/>])/g) ?? [];
  const elements = new Map<string, number>();
  for (const tag of openTags) {
    const name = tag.slice(1);
    elements.set(name, (elements.get(name) ?? 0) + 1);
  }

  const namespaces = [...xml.matchAll(/\bxmlns(?::[\w.-]+)?\s*=\s*["']([^"']+)["']/g)].map((m) => m[1]);
  const declaration = xml.match(/<\?xml[^?]*encoding\s*=\s*["']([^"']+)["']/i);

  return {
    file_type: 'xml',
    root_element: openTags.length > 0 ? openTags[0].slice(1) : null,
    element_count: openTags.length,
    unique_elements: elements.size,
    namespaces: [...new Set(namespaces)],
    encoding: declaration ? declaration[1] : 'utf-8',
  };
}

export const htmlExtractor: Extractor = {
  format: 'html',
  extensions: ['.html', '.htm'],

  async extract(filePath: string): Promise<Extraction> {
    const html = await fs.readFile(filePath, 'utf-8');
    return { text: htmlToText(html), metadata: htmlMetadata(html) };
  },
};

export const xmlExtractor: Extractor = {
  format: 'xml',
  extensions: ['.xml'],

  async extract(filePath: string): Promise<Extraction> {
    const xml = await fs.readFile(filePath, 'utf-8');
    return { text: stripMarkup(xml), metadata: xmlMetadata(xml) };
  },
};
