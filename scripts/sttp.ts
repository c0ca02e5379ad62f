#!/usr/bin/env -S node --import tsx
/**
 * @module
 *
 * CLI script to parse a CSV state transition table and export it as JSON,
 * DOT or Mermaid, or render it via Graphviz.
 *
 * @example Usage via npm script
 * ```sh
 * npm run sttp -- machine.csv jsonify
 * npm run sttp -- machine.csv visualize machine --format svg --view
 * ```
 *
 * Run with `--help` for all options.
 */

import { main } from "../src/cli.ts";

process.exitCode = main(process.argv.slice(2), {
	stdout: (text) => console.log(text),
	stderr: (text) => console.error(text),
});
