/**
 * stdio-conformance
 *
 * Black-box conformance harness for line-delimited JSON-RPC 2.0 servers that
 * speak over stdin/stdout. Every probe spawns a fresh server process, sends one
 * request and classifies the single response.
 *
 * CLI Usage:
 *   npx stdio-conformance --server ./target/release/my-server --no-build
 *
 * Programmatic Usage:
 *   import { createDefaultCases, runSuite, exitCodeFor } from 'stdio-conformance';
 *
 *   const result = await runSuite({ command: './my-server' }, createDefaultCases(), {
 *     timeout: 5000,
 *   });
 *   process.exitCode = exitCodeFor(result);
 */

// Types
export type {
  JsonRpcRequest,
  JsonRpcResponse,
  RequestTemplate,
  TargetCommand,
  RawOutput,
  TransportStatus,
  ExchangeOptions,
  Outcome,
  Verdict,
  Assertion,
  CaseInput,
  ConformanceCase,
  CaseResult,
  RunResult,
  OutputFormat,
  HarnessOptions,
} from './types.js';

// Errors
export {
  ErrorCode,
  ErrorCodeName,
  HarnessError,
  ConfigError,
  BuildError,
  isErrorCode,
  describeError,
  type ErrorCodeType,
} from './errors.js';

// Wire
export { exchange } from './transport.js';
export { createRequest, encodeRequest, decodeResponse, isRecord, type DecodeResult } from './codec.js';
export { probe, probeLine } from './probe.js';

// Cases
export { expectSuccess, expectError, hasField, hasToolNames, describeOutcome } from './assertions.js';
export {
  createDefaultCases,
  createExtendedCases,
  filterCases,
  DEFAULT_REQUIRED_TOOLS,
  DEFAULT_CALL_TOOL,
  type CaseOptions,
} from './cases.js';

// Runner
export { runSuite, runCase, exitCodeFor, type SuiteOptions } from './runner.js';
export { runBuild, ensureBuilt, DEFAULT_BUILD_COMMAND, type BuildResult } from './build.js';
export { runHarness, selectCases, formatResults } from './harness.js';

// Config
export {
  DEFAULT_OPTIONS,
  OUTPUT_FORMATS,
  MAX_TIMEOUT_MS,
  loadConfigFile,
  validateConfig,
  resolveOptions,
  parseTimeout,
  type PartialOptions,
} from './config.js';

// Reporters
export { formatTextReport, formatJsonReport, formatJUnitReport, createColors, type Colors } from './reporters/index.js';
