/**
 * Output Paths
 *
 * Maps a link record to its place in the tag tree:
 *   {outputDir}/{tag}/{title}_{domain}_{index}.pdf
 *
 * The path doubles as the idempotence key, so it must depend only on the
 * record, its position and the output directory.
 */

import path from 'path';
import { config } from './config.js';
import type { CaptureTask, LinkRecord } from './types.js';
import { sanitizeFilename } from './utils/filename.js';
import { domainOf } from './utils/url.js';

// Would resolve outside the tag tree
const RELATIVE_SEGMENTS = new Set(['', '.', '..']);

export function tagDirectoryName(tags: readonly string[]): string {
  const primary = tags[0] ? sanitizeFilename(tags[0]) : '';
  return RELATIVE_SEGMENTS.has(primary) ? config.paths.defaultTag : primary;
}

export function pdfFileName(record: LinkRecord, index: number): string {
  const title = sanitizeFilename(record.title) || `page_${index}`;
  return `${title}_${domainOf(record.url)}_${index}.pdf`;
}

export function buildCaptureTask(record: LinkRecord, index: number, outputDir: string): CaptureTask {
  const directory = path.join(outputDir, tagDirectoryName(record.tags));
  return {
    index,
    record,
    directory,
    outputPath: path.join(directory, pdfFileName(record, index)),
  };
}

/**
 * Build tasks for a whole export, numbering from 1 in input order.
 */
export function buildCaptureTasks(records: readonly LinkRecord[], outputDir: string): CaptureTask[] {
  return records.map((record, i) => buildCaptureTask(record, i + 1, outputDir));
}
