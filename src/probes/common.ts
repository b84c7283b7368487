/**
 * Helpers shared by the file-reading probes.
 */

import { readFile } from 'node:fs/promises';
import { ProbeReadError } from '../core/errors.js';

const UNSIGNED = /^\d+$/;

/** Parse a non-negative decimal counter; undefined for anything else. */
export function parseCounter(token: string | undefined): bigint | undefined {
  if (token === undefined || !UNSIGNED.test(token)) return undefined;
  return BigInt(token);
}

/** Read a whole text file, wrapping any failure in ProbeReadError. */
export async function readText(probe: string, path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    throw new ProbeReadError(probe, path, err);
  }
}

/** Non-empty lines split on runs of whitespace. */
export function tokenizeLines(text: string): string[][] {
  const rows: string[][] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    rows.push(trimmed.split(/\s+/));
  }
  return rows;
}
