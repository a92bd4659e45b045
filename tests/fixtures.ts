/**
 * Record builders shared by the tests.
 */

import type { GraphFailure, Result } from '../src/core/errors.js';
import type {
  AssertionData,
  ParsedContent,
  RequirementData,
  TestRefData,
  TestResultData,
} from '../src/core/types.js';
import { GraphBuilder } from '../src/graph/builder.js';
import type { TraceGraph } from '../src/graph/graph.js';

const SOURCE = { sourceId: 'docs/fixture.md' };

export function assertions(...labels: string[]): AssertionData[] {
  return labels.map((label) => ({ label, text: `The system shall do ${label}.` }));
}

export function requirement(
  id: string,
  data: Omit<RequirementData, 'id'> = {},
  startLine = 1
): ParsedContent {
  return {
    contentType: 'requirement',
    startLine,
    parsedData: { id, title: `Title of ${id}`, ...data },
    sourceContext: SOURCE,
  };
}

export function testRef(id: string, validates: string[], data: Omit<TestRefData, 'id' | 'validates'> = {}): ParsedContent {
  return {
    contentType: 'test_ref',
    startLine: 1,
    parsedData: { id, validates, ...data },
    sourceContext: { sourceId: 'tests/login.test.ts' },
  };
}

export function testResult(
  id: string,
  testId: string,
  status: string,
  data: Omit<TestResultData, 'id' | 'testId' | 'status'> = {}
): ParsedContent {
  return {
    contentType: 'test_result',
    startLine: 1,
    parsedData: { id, testId, status, ...data },
    sourceContext: { sourceId: 'reports/junit.xml' },
  };
}

export function codeRef(path: string, line: number, implementsIds: string[]): ParsedContent {
  return {
    contentType: 'code_ref',
    startLine: line,
    parsedData: { implements: implementsIds },
    sourceContext: { sourceId: path },
  };
}

export function journey(id: string, title?: string): ParsedContent {
  return {
    contentType: 'journey',
    startLine: 1,
    parsedData: { id, title, actor: 'Operator', goal: 'Finish a task' },
    sourceContext: SOURCE,
  };
}

export function build(...records: ParsedContent[]): TraceGraph {
  return new GraphBuilder().addAll(records).build();
}

export function expectOk<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  return result.value;
}

export function expectFailure<T>(result: Result<T>): GraphFailure {
  if (result.ok) throw new Error('Expected a failure');
  return result.error;
}
