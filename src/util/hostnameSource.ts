/**
 * Hostname sources
 *
 * The statistics export lists hostnames with their labels reversed
 * (`com.example.www`) in the first column of a tab-separated file.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { Errors } from '../core/errors.js';

/** Reverse the dot-separated labels of a name. Applying it twice restores the input. */
export function reverseHostname(hostname: string): string {
  return hostname.split('.').reverse().join('.');
}

export function parseHostnameTsv(content: string): string[] {
  let rows: string[][];
  try {
    rows = parse(content, {
      delimiter: '\t',
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw Errors.fileMalformed(error);
  }

  return rows.map((row) => reverseHostname(row[0] ?? ''));
}

export async function readHostnameTsv(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    throw Errors.fileUnreadable(path, error);
  }
  return parseHostnameTsv(content);
}
