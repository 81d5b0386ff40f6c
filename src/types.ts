/**
 * Type definitions for the stdio conformance harness
 */

// ============================================================================
// Wire types
// ============================================================================

/**
 * A JSON-RPC 2.0 request as written to the target's stdin
 */
export interface JsonRpcRequest {
  readonly jsonrpc: '2.0';
  readonly id: number;
  readonly method: string;
  readonly params?: Readonly<Record<string, unknown>>;
}

/**
 * The per-case template a fresh request is built from on every run
 */
export interface RequestTemplate {
  id: number;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * A decoded response: exactly one of success or failure
 */
export type JsonRpcResponse =
  | { kind: 'success'; result: unknown }
  | { kind: 'failure'; code: number; message: string; data?: unknown };

// ============================================================================
// Transport
// ============================================================================

/**
 * The executable under test. The CLI never passes arguments; `args` exists so
 * a script can be launched through an interpreter.
 */
export interface TargetCommand {
  command: string;
  args?: readonly string[];
  cwd?: string;
}

/**
 * Everything captured from one process exchange
 */
export type RawOutput =
  | {
      status: 'completed';
      stdout: string;
      stderr: string;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
    }
  | {
      status: 'timed-out';
      stdout: string;
      stderr: string;
      timeoutMs: number;
      /** The target itself had exited, but something still held its output pipes open */
      exited: boolean;
    }
  | {
      status: 'spawn-failed';
      stdout: string;
      stderr: string;
      error: string;
    };

export type TransportStatus = RawOutput['status'];

export interface ExchangeOptions {
  /** Kill the target if it has not exited after this many milliseconds */
  timeoutMs: number;
}

// ============================================================================
// Probe outcome
// ============================================================================

/**
 * The result of one probe. This is the only value an assertion examines.
 */
export type Outcome =
  | { kind: 'decoded'; response: JsonRpcResponse }
  | { kind: 'transport-error'; reason: string; stderr: string }
  | { kind: 'decode-error'; reason: string; rawText: string; stderr: string };

// ============================================================================
// Cases and results
// ============================================================================

/**
 * Pass/fail verdict with an optional human-readable explanation
 */
export interface Verdict {
  passed: boolean;
  detail?: string;
}

export type Assertion = (outcome: Outcome) => Verdict;

/**
 * What a case sends: a request built from a template, or a raw line used to
 * check how the target handles broken framing
 */
export type CaseInput =
  | { kind: 'request'; template: RequestTemplate }
  | { kind: 'raw'; line: string };

/**
 * A single independently runnable conformance check
 */
export interface ConformanceCase {
  /** Display name, also the identifier in reports */
  name: string;
  /** Human-readable description */
  description: string;
  input: CaseInput;
  assert: Assertion;
}

/**
 * Result of running a single case
 */
export interface CaseResult {
  name: string;
  passed: boolean;
  /** Diagnostic or confirmation text */
  detail?: string;
  /** Duration in milliseconds */
  duration: number;
}

/**
 * Result of running the whole suite
 */
export interface RunResult {
  /** Path of the executable under test */
  target: string;
  /** One entry per case, in execution order */
  results: CaseResult[];
  passed: number;
  failed: number;
  total: number;
  /** Total duration in milliseconds */
  duration: number;
  /** Timestamp of the run */
  timestamp: string;
}

// ============================================================================
// Options
// ============================================================================

export type OutputFormat = 'text' | 'json' | 'junit';

/**
 * Fully resolved harness configuration
 */
export interface HarnessOptions {
  /** Path to the executable under test */
  server: string;
  /** Shell command that builds the server, or false to skip the build */
  build: string | false;
  /** Working directory for the build and for resolving the server path */
  cwd: string;
  /** Timeout for each probe in milliseconds */
  timeout: number;
  /** Tool names `tools/list` must include */
  requiredTools: string[];
  /** Tool invoked by the `tools/call` case */
  callTool: string;
  /** Also run the raw-line framing case */
  extended: boolean;
  /** Run only cases matching this pattern */
  filter?: string;
  /** Output format for results */
  output: OutputFormat;
  /** File to write output to (if not stdout) */
  outputFile?: string;
  /** Colorize text output */
  color: boolean;
  /** Stream per-case progress to stderr */
  verbose: boolean;
  /** List cases without building or running anything */
  list: boolean;
}
