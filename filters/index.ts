#!/usr/bin/env node
/**
 * Footnote Styler Entry Point
 *
 * A pandoc JSON filter. Pandoc runs it with the output format as the first
 * argument, writes the document AST to stdin and reads the result from stdout.
 *
 * Usage:
 *   pandoc book.md --filter footnote-styler -t html5 -o book.html
 *   pandoc -t json book.md | footnote-styler html | pandoc -f json -o book.html
 */

import { runCli } from './cli';
import { logError } from './utils/commonUtils';

runCli({ argv: process.argv.slice(2), stdin: process.stdin, stdout: process.stdout })
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logError('footnote-styler', 'Error running footnote filter:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
