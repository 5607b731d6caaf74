/**
 * Book Reader Module
 * Extracts plain text from TXT, FB2, FB2.ZIP and EPUB files.
 * Paragraphs come back separated by blank lines, ready for the normalizer.
 */

import fs from 'fs';
import path from 'path';
import * as cheerio from 'cheerio';
import { BookReadError, PortionerError, UnsupportedFormatError } from './errors.js';
import { ZipReader } from './zip-reader.js';

export type BookFormat = 'txt' | 'fb2' | 'fb2.zip' | 'epub';

export interface BookText {
  format: BookFormat;
  /** File name without directory or book extension */
  name: string;
  text: string;
}

export function detectFormat(filePath: string): BookFormat | null {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.zip')) return 'fb2.zip';
  if (lower.endsWith('.fb2')) return 'fb2';
  if (lower.endsWith('.epub')) return 'epub';
  if (lower.endsWith('.txt')) return 'txt';
  return null;
}

export function bookNameFromPath(filePath: string): string {
  const base = path.basename(filePath);
  const lower = base.toLowerCase();
  if (lower.endsWith('.fb2.zip')) return base.slice(0, -'.fb2.zip'.length);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

function joinParagraphs(parts: string[]): string {
  return parts.filter((part: string) => part.length > 0).join('\n\n');
}

function cleanElementText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * FB2: every <p>, then every <v> (poem verse), in document order.
 * Raw bytes are decoded by the XML `encoding=` declaration (UTF-8 when absent).
 */
export function extractFb2Text(xml: string | Buffer): string {
  const $ = typeof xml === 'string'
    ? cheerio.load(xml, { xml: true })
    : cheerio.loadBuffer(xml, { xml: true });
  const parts: string[] = [];

  $('p').each((_i, el) => {
    parts.push(cleanElementText($(el).text()));
  });
  $('v').each((_i, el) => {
    parts.push(cleanElementText($(el).text()));
  });

  return joinParagraphs(parts);
}

export function extractHtmlParagraphs(html: string): string[] {
  const $ = cheerio.load(html);
  const parts: string[] = [];
  $('p').each((_i, el) => {
    parts.push(cleanElementText($(el).text()));
  });
  return parts;
}

function resolveHref(baseDir: string, href: string): string {
  const clean = decodeURIComponent(href.split('#')[0]);
  return path.posix.normalize(path.posix.join(baseDir, clean));
}

/**
 * EPUB: container.xml → OPF package → spine documents in reading order
 */
export function extractEpubText(zip: ZipReader): string {
  const container = cheerio.load(zip.readText('META-INF/container.xml'), { xml: true });
  const opfPath = container('rootfile').first().attr('full-path');
  if (!opfPath) {
    throw new Error('No rootfile found in container.xml');
  }

  const opf = cheerio.load(zip.readText(opfPath), { xml: true });
  const baseDir = path.posix.dirname(opfPath);

  const manifest = new Map<string, { href: string; mediaType: string }>();
  opf('manifest > item').each((_i, el) => {
    const id = opf(el).attr('id');
    const href = opf(el).attr('href');
    if (id && href) {
      manifest.set(id, { href: resolveHref(baseDir, href), mediaType: opf(el).attr('media-type') ?? '' });
    }
  });

  const documents: string[] = [];
  opf('spine > itemref').each((_i, el) => {
    const item = manifest.get(opf(el).attr('idref') ?? '');
    if (item) documents.push(item.href);
  });

  // No usable spine: fall back to manifest order
  if (documents.length === 0) {
    for (const item of manifest.values()) {
      if (item.mediaType === 'application/xhtml+xml' || item.mediaType === 'text/html') {
        documents.push(item.href);
      }
    }
  }

  const parts: string[] = [];
  for (const doc of documents) {
    if (!zip.has(doc)) continue;
    parts.push(...extractHtmlParagraphs(zip.readText(doc)));
  }

  return joinParagraphs(parts);
}

export function extractFb2ZipText(zip: ZipReader): string {
  const fb2Entry = zip.getEntryNames().find((name: string) => name.toLowerCase().endsWith('.fb2'));
  if (!fb2Entry) {
    throw new Error('Archive contains no .fb2 file');
  }
  return extractFb2Text(zip.readEntry(fb2Entry));
}

export function decodeBook(format: BookFormat, data: Buffer): string {
  switch (format) {
    case 'txt':
      return data.toString('utf8');
    case 'fb2':
      return extractFb2Text(data);
    case 'fb2.zip':
      return extractFb2ZipText(new ZipReader(data));
    case 'epub':
      return extractEpubText(new ZipReader(data));
  }
}

export async function readBook(filePath: string): Promise<BookText> {
  const format = detectFormat(filePath);
  if (!format) {
    throw new UnsupportedFormatError(path.extname(filePath).toLowerCase());
  }

  try {
    const data = await fs.promises.readFile(filePath);
    return { format, name: bookNameFromPath(filePath), text: decodeBook(format, data) };
  } catch (err) {
    if (err instanceof PortionerError) throw err;
    throw new BookReadError(filePath, err);
  }
}
