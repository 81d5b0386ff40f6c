#!/usr/bin/env node
/**
 * CLI entry point for the stdio conformance harness
 *
 * Usage:
 *   stdio-conformance
 *   stdio-conformance --server ./bin/my-server --no-build
 *   stdio-conformance --output junit --output-file results.xml
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import pc from 'picocolors';

import { DEFAULT_OPTIONS, loadConfigFile, parseTimeout, resolveOptions, type PartialOptions } from './config.js';
import { HarnessError, describeError } from './errors.js';
import { runHarness } from './harness.js';
import type { OutputFormat } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Read package.json for version
function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Running from an unusual layout; fall through to the default
  }
  return '0.1.0';
}

interface CliFlags {
  server?: string;
  build?: string | false;
  cwd?: string;
  timeout?: number;
  requireTool?: string[];
  callTool?: string;
  extended?: boolean;
  filter?: string;
  output?: OutputFormat;
  outputFile?: string;
  config?: string;
  color: boolean;
  verbose?: boolean;
  list?: boolean;
}

const program = new Command();

program
  .name('stdio-conformance')
  .description('Conformance harness for line-delimited JSON-RPC 2.0 servers over stdio')
  .version(readVersion());

program
  .option('-s, --server <path>', `Executable under test (default: ${DEFAULT_OPTIONS.server})`)
  .option('-b, --build <command>', 'Shell command that builds the server before testing')
  .option('--no-build', 'Skip the build step')
  .option('--cwd <dir>', 'Working directory for the build and the server path')
  .option('-t, --timeout <ms>', `Timeout for each probe in milliseconds (default: ${DEFAULT_OPTIONS.timeout})`, (value) =>
    parseCliTimeout(value)
  )
  .option('--require-tool <names...>', 'Tool names tools/list must include')
  .option('--call-tool <name>', 'Tool to invoke in the tools/call case')
  .option('--extended', 'Also send a malformed line and expect a parse error')
  .option('--filter <pattern>', 'Run only cases matching a name pattern (regex)')
  .option('-o, --output <format>', 'Output format: text, json, or junit', (value) => parseCliOutput(value))
  .option('-f, --output-file <file>', 'Write output to file instead of stdout')
  .option('-c, --config <file>', 'Read settings from a YAML config file')
  .option('--no-color', 'Disable colored output')
  .option('-v, --verbose', 'Print progress as each case finishes')
  .option('--list', 'List cases without building or running anything');

function parseCliTimeout(value: string): number {
  try {
    return parseTimeout(value, '--timeout');
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

function parseCliOutput(value: string): OutputFormat {
  if (value === 'text' || value === 'json' || value === 'junit') {
    return value;
  }
  throw new InvalidArgumentError('Valid formats: text, json, junit');
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  program.parse();
  const opts = program.opts<CliFlags>();

  try {
    const fileConfig = opts.config ? loadConfigFile(opts.config) : {};
    const flags: PartialOptions = {
      server: opts.server,
      build: opts.build,
      cwd: opts.cwd,
      timeout: opts.timeout,
      requiredTools: opts.requireTool,
      callTool: opts.callTool,
      extended: opts.extended,
      filter: opts.filter,
      output: opts.output,
      outputFile: opts.outputFile,
      // --no-color only ever turns color off; leave it to the file otherwise
      color: opts.color ? undefined : false,
      verbose: opts.verbose,
      list: opts.list,
    };

    const options = resolveOptions(flags, fileConfig);
    process.exitCode = await runHarness(options);
  } catch (error) {
    if (error instanceof HarnessError) {
      console.error(pc.red(`Error: ${error.message}`));
    } else {
      console.error(pc.red(`Error: ${describeError(error)}`));
      if (opts.verbose && error instanceof Error && error.stack) {
        console.error(pc.dim(error.stack));
      }
    }
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(pc.red(`Fatal: ${describeError(error)}`));
  process.exitCode = 1;
});
