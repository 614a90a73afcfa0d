#!/usr/bin/env node
/**
 * Puzzle Search - CLI Interface
 */

import { parseArgs, HELP_TEXT } from './args.js';
import { runCompare, runSearch } from './commands.js';

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  switch (options.command) {
    case 'search':
      console.log(runSearch(options));
      break;

    case 'compare':
      console.log(runCompare(options));
      break;

    case 'help':
    default:
      console.log(HELP_TEXT);
      break;
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
