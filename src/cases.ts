/**
 * The fixed conformance cases
 */

import { expectError, expectSuccess, hasField, hasToolNames } from './assertions.js';
import type { ConformanceCase } from './types.js';

export const DEFAULT_REQUIRED_TOOLS: readonly string[] = ['list_sources', 'list_chats', 'get_messages'];
export const DEFAULT_CALL_TOOL = 'list_sources';

export interface CaseOptions {
  /** Tool names `tools/list` must include */
  requiredTools?: readonly string[];
  /** Tool invoked by the `tools/call` case */
  callTool?: string;
}

/**
 * The five cases every target must pass, in run order
 */
export function createDefaultCases(options: CaseOptions = {}): ConformanceCase[] {
  const requiredTools = options.requiredTools ?? DEFAULT_REQUIRED_TOOLS;
  const callTool = options.callTool ?? DEFAULT_CALL_TOOL;

  return [
    {
      name: 'Initialize',
      description: 'initialize returns a result carrying protocolVersion',
      input: { kind: 'request', template: { id: 1, method: 'initialize', params: {} } },
      assert: expectSuccess(
        hasField('protocolVersion', (version) => `Protocol version: ${typeof version === 'string' ? version : JSON.stringify(version)}`)
      ),
    },
    {
      name: 'List Tools',
      description: `tools/list names at least ${requiredTools.join(', ')}`,
      input: { kind: 'request', template: { id: 2, method: 'tools/list' } },
      assert: expectSuccess(hasToolNames(requiredTools)),
    },
    {
      name: 'Call Tool',
      description: `tools/call ${callTool} returns a result carrying content`,
      input: {
        kind: 'request',
        template: { id: 3, method: 'tools/call', params: { name: callTool, arguments: {} } },
      },
      assert: expectSuccess(hasField('content', () => 'Response has content field')),
    },
    {
      name: 'Invalid Method Error',
      description: 'an unknown method is rejected with an error response',
      input: { kind: 'request', template: { id: 4, method: 'invalid_method' } },
      assert: expectError(),
    },
    {
      name: 'Invalid Tool Error',
      description: 'tools/call with an unknown tool is rejected with an error response',
      input: {
        kind: 'request',
        template: { id: 5, method: 'tools/call', params: { name: 'invalid_tool', arguments: {} } },
      },
      assert: expectError(),
    },
  ];
}

/**
 * The default cases plus framing checks that send deliberately broken input
 */
export function createExtendedCases(options: CaseOptions = {}): ConformanceCase[] {
  return [
    ...createDefaultCases(options),
    {
      name: 'Parse Error',
      description: 'a line that is not JSON is rejected with an error response',
      input: { kind: 'raw', line: '{invalid json}' },
      assert: expectError(),
    },
  ];
}

/**
 * Keep cases whose name or description matches `pattern` (case-insensitive)
 */
export function filterCases(cases: ConformanceCase[], pattern: string): ConformanceCase[] {
  const regex = new RegExp(pattern, 'i');
  return cases.filter((test) => regex.test(test.name) || regex.test(test.description));
}
