#!/usr/bin/env node

import { existsSync, readFileSync, realpathSync, statSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import minimist from 'minimist';

import { resolveConfig } from './config.js';
import { convertVenmoCsv } from './converter.js';
import { InputNotFoundError } from './errors.js';

function showHelp(): void {
  console.log(`
Usage: venmo-to-quicken [options] <input_csv>

Convert a Venmo account statement CSV into a CSV that Quicken can import.

Arguments:
  input_csv                   Venmo statement export (required)

Options:
  -o, --output <file>         Output CSV file (default: <input>_for_Quicken.csv beside the input)
  -a, --account <name>        Quicken account name (default: Venmo)
  -f, --date-format <pattern> Date pattern for the output, date-fns tokens (default: MM/dd/yyyy)
  -h, --help                  Show this help message

Environment Variables:
  VENMO_QUICKEN_ACCOUNT       Account name when --account is not given
  VENMO_QUICKEN_DATE_FORMAT   Date pattern when --date-format is not given

Examples:
  venmo-to-quicken VenmoStatement_May_2023.csv
  venmo-to-quicken -a "Venmo (Joint)" -f yyyy-MM-dd -o may.csv VenmoStatement_May_2023.csv
`);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function defaultOutputPath(inputPath: string): string {
  const name = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${name}_for_Quicken.csv`);
}

function assertInputExists(inputPath: string): void {
  if (!existsSync(inputPath) || !statSync(inputPath).isFile()) {
    throw new InputNotFoundError(inputPath);
  }
}

/**
 * Runs one conversion from command-line arguments and returns the exit code.
 */
export function run(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  const args = minimist(argv, {
    string: ['output', 'account', 'date-format'],
    boolean: ['help'],
    alias: {
      h: 'help',
      o: 'output',
      a: 'account',
      f: 'date-format',
    },
  });

  if (args.help) {
    showHelp();
    return 0;
  }

  const inputPath = args._[0] ? String(args._[0]) : null;
  if (!inputPath) {
    console.error('❌ Error: Input file is required.');
    showHelp();
    return 1;
  }

  try {
    const config = resolveConfig(
      {
        account: optionalString(args.account),
        dateFormat: optionalString(args['date-format']),
      },
      env,
    );
    assertInputExists(inputPath);

    const outputPath = optionalString(args.output) || defaultOutputPath(inputPath);

    console.log(`📁 Reading Venmo statement: ${inputPath}`);
    const text = readFileSync(inputPath, 'utf8');
    const { csv, summary } = convertVenmoCsv(text, config);

    writeFileSync(outputPath, csv, 'utf8');

    console.log(`✅ Converted ${summary.written} transactions`);
    console.log(`⏭️ Skipped ${summary.skippedBalances} balance lines`);
    console.log(`📄 Output saved to: ${outputPath}`);
    return 0;
  } catch (error) {
    console.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

// npm links the bin, so compare real paths
const entry = process.argv[1];
const invokedDirectly = entry !== undefined
  && existsSync(entry)
  && realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));

if (invokedDirectly) {
  process.exitCode = run(process.argv.slice(2));
}
