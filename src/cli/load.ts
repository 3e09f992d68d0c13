/**
 * load.ts - Load a command's word list, reporting progress when verbose
 */

import type { Trie } from '../trie/index.js';
import { loadTrie } from '../wordlist.js';
import type { Output, ParsedArgs } from './args.js';

function elapsed(start: number): string {
  return `${(performance.now() - start).toFixed(1)} ms`;
}

export async function loadForCommand(filePath: string, parsed: ParsedArgs, io: Output): Promise<Trie> {
  const start = performance.now();
  const trie = await loadTrie(filePath, { compression: parsed.compression });

  if (parsed.verbose) {
    const stats = trie.stats();
    io.error(`Loaded ${stats.words.toLocaleString()} words from ${filePath} in ${elapsed(start)}`);
    io.error(`Nodes:      ${stats.nodes.toLocaleString()}`);
    io.error(`Leaves:     ${stats.leaves.toLocaleString()}`);
    io.error(`Max depth:  ${stats.maxDepth}`);
  }

  return trie;
}
