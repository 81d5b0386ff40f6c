/**
 * Harness configuration
 * Merges built-in defaults, an optional YAML config file and CLI flags
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import pc from 'picocolors';
import { DEFAULT_BUILD_COMMAND } from './build.js';
import { DEFAULT_CALL_TOOL, DEFAULT_REQUIRED_TOOLS } from './cases.js';
import { ConfigError, describeError } from './errors.js';
import type { HarnessOptions, OutputFormat } from './types.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'junit'];

/** Longest delay a Node timer honours; larger values fire after 1 ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_OPTIONS: Readonly<HarnessOptions> = {
  server: './target/release/chat-mcp-server',
  build: DEFAULT_BUILD_COMMAND,
  cwd: '.',
  timeout: 5000,
  requiredTools: [...DEFAULT_REQUIRED_TOOLS],
  callTool: DEFAULT_CALL_TOOL,
  extended: false,
  output: 'text',
  color: pc.isColorSupported,
  verbose: false,
  list: false,
};

/**
 * Settings a config file or the command line may override
 */
export type PartialOptions = Partial<HarnessOptions>;

/**
 * Load and validate a YAML config file.
 *
 * Relative `server` and `cwd` paths are resolved against the file's directory.
 */
export function loadConfigFile(filePath: string): PartialOptions {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError('config file does not exist', filePath);
  }

  let content: unknown;
  try {
    content = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new ConfigError(`invalid YAML: ${message}`, filePath);
  }

  if (content === undefined || content === null) {
    return {};
  }

  const config = validateConfig(content, filePath);
  const baseDir = path.dirname(path.resolve(filePath));

  if (config.cwd !== undefined) {
    config.cwd = path.resolve(baseDir, config.cwd);
  } else if (config.server !== undefined) {
    // The server path is resolved against cwd later; anchor cwd at the file
    // so the path means the same thing wherever the harness is started.
    config.cwd = baseDir;
  }

  return config;
}

/**
 * Validate an already-parsed config object
 */
export function validateConfig(content: unknown, source: string): PartialOptions {
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    throw new ConfigError('config must be a mapping', source);
  }

  const config: PartialOptions = {};
  const entries: Array<[string, unknown]> = Object.entries(content);

  for (const [key, value] of entries) {
    switch (key) {
      case 'server':
      case 'cwd':
      case 'callTool':
      case 'filter':
      case 'outputFile':
        config[key] = expectString(value, key, source);
        break;
      case 'build':
        config.build = value === false ? false : expectString(value, key, source);
        break;
      case 'timeout':
        config.timeout = parseTimeout(value, source);
        break;
      case 'requiredTools':
        if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
          throw new ConfigError(`'requiredTools' must be a list of strings`, source);
        }
        config.requiredTools = value;
        break;
      case 'output':
        config.output = parseOutputFormat(value, source);
        break;
      case 'extended':
      case 'color':
      case 'verbose':
        if (typeof value !== 'boolean') {
          throw new ConfigError(`'${key}' must be true or false`, source);
        }
        config[key] = value;
        break;
      default:
        throw new ConfigError(`unknown setting '${key}'`, source);
    }
  }

  return config;
}

/**
 * Combine defaults < config file < CLI flags and validate the result
 */
export function resolveOptions(flags: PartialOptions, fileConfig: PartialOptions = {}): HarnessOptions {
  const merged: HarnessOptions = {
    server: flags.server ?? fileConfig.server ?? DEFAULT_OPTIONS.server,
    build: flags.build ?? fileConfig.build ?? DEFAULT_OPTIONS.build,
    cwd: flags.cwd ?? fileConfig.cwd ?? DEFAULT_OPTIONS.cwd,
    timeout: flags.timeout ?? fileConfig.timeout ?? DEFAULT_OPTIONS.timeout,
    requiredTools: [...(flags.requiredTools ?? fileConfig.requiredTools ?? DEFAULT_OPTIONS.requiredTools)],
    callTool: flags.callTool ?? fileConfig.callTool ?? DEFAULT_OPTIONS.callTool,
    extended: flags.extended ?? fileConfig.extended ?? DEFAULT_OPTIONS.extended,
    filter: flags.filter ?? fileConfig.filter,
    output: flags.output ?? fileConfig.output ?? DEFAULT_OPTIONS.output,
    outputFile: flags.outputFile ?? fileConfig.outputFile,
    color: flags.color ?? fileConfig.color ?? DEFAULT_OPTIONS.color,
    verbose: flags.verbose ?? fileConfig.verbose ?? DEFAULT_OPTIONS.verbose,
    list: flags.list ?? DEFAULT_OPTIONS.list,
  };

  parseTimeout(merged.timeout, '--timeout');
  parseOutputFormat(merged.output, '--output');

  if (merged.filter !== undefined) {
    try {
      new RegExp(merged.filter, 'i');
    } catch (error) {
      throw new ConfigError(`invalid pattern: ${describeError(error)}`, '--filter');
    }
  }

  if (merged.requiredTools.length === 0) {
    throw new ConfigError('at least one required tool must be named', '--require-tool');
  }

  return merged;
}

/**
 * Parse a timeout given on the command line or in a file
 */
export function parseTimeout(value: unknown, source: string): number {
  const timeout = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
  if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
    throw new ConfigError(`timeout must be a positive integer (milliseconds), got ${String(value)}`, source);
  }
  if (timeout > MAX_TIMEOUT_MS) {
    throw new ConfigError(`timeout must be at most ${MAX_TIMEOUT_MS} milliseconds, got ${timeout}`, source);
  }
  return timeout;
}

function parseOutputFormat(value: unknown, source: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (format === undefined) {
    throw new ConfigError(`invalid output format '${String(value)}' (valid: ${OUTPUT_FORMATS.join(', ')})`, source);
  }
  return format;
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`'${key}' must be a non-empty string`, source);
  }
  return value;
}
