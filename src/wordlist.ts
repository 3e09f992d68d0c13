/**
 * wordlist.ts - Load one-word-per-line word lists into a trie
 *
 * Input formats (detected by extension, or forced by option):
 *   .gz      - gzip-compressed word list
 *   .br      - brotli-compressed word list
 *   other    - plain UTF-8 text
 *
 * Lines are passed to Trie.fromLines() as-is: trimming, uppercasing and
 * validation happen there. Read and decompression errors propagate unchanged.
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import * as zlib from 'zlib';
import { Trie } from './trie/index.js';

export type Compression = 'none' | 'gzip' | 'brotli';

export interface ReadOptions {
  /** Override detection by file extension */
  compression?: Compression;
}

/**
 * Pick the decompression for a path by its extension.
 */
export function detectCompression(filePath: string): Compression {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.gz') return 'gzip';
  if (ext === '.br') return 'brotli';
  return 'none';
}

/**
 * Split text into lines on \r\n, \r or \n.
 * A final line break does not start an extra empty line; blank lines inside
 * the text are kept.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function decompress(data: Buffer, compression: Compression): Buffer {
  switch (compression) {
    case 'gzip':
      return zlib.gunzipSync(data);
    case 'brotli':
      return zlib.brotliDecompressSync(data);
    case 'none':
      return data;
  }
}

/**
 * Read the raw lines of a word list file.
 */
export async function readWordList(filePath: string, options: ReadOptions = {}): Promise<string[]> {
  const compression = options.compression ?? detectCompression(filePath);
  const data = await readFile(filePath);
  return splitLines(decompress(data, compression).toString('utf-8'));
}

/**
 * Build a trie from a word list file.
 *
 * @throws InvalidCharacterError if a line holds anything but letters once
 *   trimmed and uppercased
 */
export async function loadTrie(filePath: string, options: ReadOptions = {}): Promise<Trie> {
  return Trie.fromLines(await readWordList(filePath, options));
}
