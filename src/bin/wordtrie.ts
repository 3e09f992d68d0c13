#!/usr/bin/env node
import { runMain } from '../cli/main.js';
import { run } from '../cli/wordtrie.js';

runMain(args => run(args));
