/**
 * Loads threat intelligence text for rule generation.
 *
 * Accepts a single .txt, .md or .html file, or a directory of them. HTML
 * is reduced to its main article text; directory contents are joined
 * with a header per file.
 */

import * as cheerio from 'cheerio';
import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.markdown', '.html', '.htm'] as const;

const MAIN_CONTENT_SELECTORS = ['article', 'main', '[role="main"]', '.post-content', '.entry-content', '.content', '#content'];

export interface CtiDocument {
  path: string;
  text: string;
}

/**
 * Read CTI from a file or directory.
 *
 * @throws Error when the path has no supported file or only empty ones.
 */
export async function loadCti(path: string): Promise<{ text: string; documents: CtiDocument[] }> {
  const info = await stat(path);
  const files = info.isDirectory() ? await listSupportedFiles(path) : [path];

  if (files.length === 0) {
    throw new Error(`No CTI files (${SUPPORTED_EXTENSIONS.join(', ')}) found in ${path}`);
  }

  const documents: CtiDocument[] = [];
  for (const file of files) {
    if (!isSupported(file)) {
      throw new Error(`Unsupported CTI file type: ${file}`);
    }
    const text = extractText(await readFile(file, 'utf-8'), extname(file).toLowerCase());
    if (text.length > 0) documents.push({ path: file, text });
  }

  if (documents.length === 0) {
    throw new Error(`CTI input at ${path} contains no text`);
  }

  const text = documents.length === 1
    ? documents[0].text
    : documents.map((d) => `## Source: ${basename(d.path)}\n\n${d.text}`).join('\n\n');

  return { text, documents };
}

/**
 * Plain text of a CTI document given its extension.
 */
export function extractText(content: string, extension: string): string {
  if (extension === '.html' || extension === '.htm') {
    return htmlToText(content);
  }
  return content.replace(/\r\n/g, '\n').trim();
}

/**
 * Main-content text of an HTML page, without navigation, scripts or styles.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('nav, header, footer, aside, .sidebar, .navigation, .menu').remove();
  $('script, style, noscript, iframe').remove();

  const main = MAIN_CONTENT_SELECTORS.map((selector) => $(selector).first()).find((el) => el.length > 0);
  const root = main ?? $('body');

  const blocks: string[] = [];
  root.find('h1, h2, h3, h4, h5, h6, p, li, pre, td').each((_, el) => {
    const text = $(el).text().replace(/\s+/g, ' ').trim();
    if (text.length > 0) blocks.push(text);
  });

  if (blocks.length === 0) {
    return root.text().replace(/\s+/g, ' ').trim();
  }
  return blocks.join('\n');
}

async function listSupportedFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupported(entry.name))
    .map((entry) => join(dir, entry.name))
    .sort();
}

function isSupported(file: string): boolean {
  const ext = extname(file).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}
