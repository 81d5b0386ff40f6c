/**
 * End-to-end harness run: build, probe, report
 */

import * as fs from 'fs';
import * as path from 'path';

import { ensureBuilt } from './build.js';
import { createDefaultCases, createExtendedCases, filterCases } from './cases.js';
import { BuildError } from './errors.js';
import { createColors, formatJUnitReport, formatJsonReport, formatTextReport, type Colors } from './reporters/index.js';
import { exitCodeFor, runSuite } from './runner.js';
import type { ConformanceCase, HarnessOptions, RunResult } from './types.js';

/**
 * The cases selected by `options`, in run order
 */
export function selectCases(options: HarnessOptions): ConformanceCase[] {
  const caseOptions = { requiredTools: options.requiredTools, callTool: options.callTool };
  const cases = options.extended ? createExtendedCases(caseOptions) : createDefaultCases(caseOptions);
  return options.filter ? filterCases(cases, options.filter) : cases;
}

/**
 * Format the results based on output format
 */
export function formatResults(result: RunResult, options: HarnessOptions, colors: Colors): string {
  switch (options.output) {
    case 'json':
      return formatJsonReport(result);
    case 'junit':
      return formatJUnitReport(result);
    case 'text':
      return formatTextReport(result, colors);
  }
}

/**
 * Run the whole harness and return the process exit code.
 *
 * Progress goes to stderr, the report to stdout (or `outputFile`).
 */
export async function runHarness(options: HarnessOptions): Promise<number> {
  const c = createColors(options.color);
  const cwd = path.resolve(options.cwd);
  const cases = selectCases(options);

  if (cases.length === 0) {
    console.error(c.red('No cases match the filter pattern'));
    return 1;
  }

  if (options.list) {
    console.log(c.bold('\nAvailable Conformance Cases\n'));
    for (const test of cases) {
      console.log(`  - ${test.name}`);
      if (options.verbose) {
        console.log(c.dim(`    ${test.description}`));
      }
    }
    console.log(`\nTotal: ${cases.length} cases`);
    return 0;
  }

  if (options.build !== false) {
    console.error(c.yellow('Building server...'));
    console.error(c.dim(`  ${options.build}`));
    try {
      const build = await ensureBuilt(options.build, { cwd });
      console.error(c.green(`Server built successfully ${c.dim(`(${build.duration}ms)`)}`));
    } catch (error) {
      if (!(error instanceof BuildError)) {
        throw error;
      }
      console.error(c.red(`Failed to build server: ${error.message}`));
      if (error.output) {
        console.error(error.output);
      }
      return 1;
    }
  }

  const server = path.resolve(cwd, options.server);
  console.error(c.dim(`Running ${cases.length} cases against ${server}...`));

  const result = await runSuite({ command: server, cwd }, cases, {
    timeout: options.timeout,
    onResult: options.verbose
      ? (test, index, total) => {
          const status = test.passed ? c.green('PASSED') : c.red('FAILED');
          console.error(c.dim(`[${index + 1}/${total}]`) + ` ${test.name}: ${status}`);
        }
      : undefined,
  });

  const output = formatResults(result, options, c);
  if (options.outputFile) {
    fs.writeFileSync(options.outputFile, output, 'utf-8');
    console.error(c.dim(`Results written to: ${options.outputFile}`));
  } else {
    console.log(output);
  }

  return exitCodeFor(result);
}
