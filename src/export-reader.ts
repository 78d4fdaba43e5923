/**
 * Export Reader
 *
 * Parses a bookmarking-service export into ordered link records.
 * Supports the tabular CSV export, the HTML anchor-list export and a plain
 * list of URLs. Rows without a URL are dropped without complaint; exports
 * routinely contain a few unusable rows.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import * as cheerio from 'cheerio';
import Papa from 'papaparse';
import type { ExportFormat, LinkRecord } from './types.js';
import { InputError, isNotFoundError, toErrorMessage } from './utils/errors.js';

const DEFAULT_TITLE = 'untitled';

const CSV_URL_FIELDS = ['resolved_url', 'given_url', 'url'] as const;
const CSV_TITLE_FIELDS = ['resolved_title', 'given_title', 'title'] as const;
const HTML_TAG_ATTRIBUTES = ['tags', 'data-tag'] as const;

type CsvRow = Record<string, string | undefined>;

function makeRecord(url: string, title: string | undefined, tags: string[]): LinkRecord {
  return Object.freeze({
    url,
    title: title || DEFAULT_TITLE,
    tags: Object.freeze(tags),
  });
}

function firstField(row: CsvRow, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const value = row[field]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Split a tag field on `,` and `|`, trimming each tag and dropping blanks.
 */
export function splitTags(value: string | undefined, delimiters: RegExp = /[,|]/): string[] {
  if (!value) return [];
  return value
    .split(delimiters)
    .map((tag) => tag.trim())
    .filter(Boolean);
}

export function parseCsvExport(content: string): LinkRecord[] {
  const parsed = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const records: LinkRecord[] = [];
  for (const row of parsed.data) {
    const url = firstField(row, CSV_URL_FIELDS);
    if (!url) continue;
    records.push(makeRecord(url, firstField(row, CSV_TITLE_FIELDS), splitTags(row.tags)));
  }
  return records;
}

export function parseHtmlExport(content: string): LinkRecord[] {
  const $ = cheerio.load(content);
  const records: LinkRecord[] = [];

  $('a[href]').each((_, element) => {
    const anchor = $(element);
    const url = anchor.attr('href')?.trim();
    if (!url) return;

    const tagAttribute = HTML_TAG_ATTRIBUTES.map((name) => anchor.attr(name)).find((value) => value !== undefined);
    records.push(makeRecord(url, anchor.text().trim(), splitTags(tagAttribute, /,/)));
  });

  return records;
}

export function parseTextExport(content: string): LinkRecord[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .map((url) => makeRecord(url, undefined, []));
}

export function detectExportFormat(filePath: string): ExportFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.html' || ext === '.htm') return 'html';
  return 'text';
}

export function parseExport(content: string, format: ExportFormat): LinkRecord[] {
  switch (format) {
    case 'csv':
      return parseCsvExport(content);
    case 'html':
      return parseHtmlExport(content);
    case 'text':
      return parseTextExport(content);
  }
}

/**
 * Read and decode an export file as UTF-8 (a leading BOM is dropped).
 *
 * @throws InputError if the file cannot be read or is not valid UTF-8
 */
export async function readExportFile(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (e) {
    const reason = isNotFoundError(e) ? 'file not found' : toErrorMessage(e);
    throw new InputError(filePath, `Cannot read export file ${filePath}: ${reason}`, { cause: e });
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (e) {
    throw new InputError(filePath, `Export file ${filePath} is not valid UTF-8`, { cause: e });
  }
}

export async function readExport(filePath: string, format: ExportFormat = detectExportFormat(filePath)): Promise<LinkRecord[]> {
  const content = await readExportFile(filePath);
  return parseExport(content, format);
}
