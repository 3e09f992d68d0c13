/**
 * testing.ts - Helpers for command tests
 */

import { fileURLToPath } from 'url';
import type { Output } from './args.js';

/** Word list shipped with the repository for command tests */
export const FIXTURE_WORDS = fileURLToPath(new URL('../../fixtures/words.txt', import.meta.url));

export interface CapturedOutput extends Output {
  out: string[];
  err: string[];
}

export function captureOutput(): CapturedOutput {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    log(message?: string) {
      out.push(message ?? '');
    },
    error(message?: string) {
      err.push(message ?? '');
    },
  };
}
