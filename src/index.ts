/**
 * reqgraph - requirements traceability graph engine
 *
 * @packageDocumentation
 */

export type * from './core/types.js';
export { ok, fail, ConfigError, RecordFileError } from './core/errors.js';
export type { FailureKind, GraphFailure, Result } from './core/errors.js';
export { computeRequirementHash, DEFAULT_HASH_OPTIONS } from './core/hash.js';
export type { HashMode, HashOptions } from './core/hash.js';

export { loadConfig, defaultConfig } from './config/loader.js';
export type { ReqgraphConfig, ReqgraphConfigInput } from './config/schema.js';

export { TraceGraph } from './graph/graph.js';
export { GraphNode } from './graph/node.js';
export { GraphBuilder } from './graph/builder.js';
export { buildGraph } from './graph/factory.js';
export type { BuiltGraph } from './graph/factory.js';
export { validateGraph, detectCycles } from './graph/validate.js';
export { toNodeView } from './graph/serialize.js';
export type { NodeView, AssertionView, AssertionInContext } from './graph/serialize.js';

export { annotateCoverage, coverageBreakdown, implementationStatus } from './coverage/rollup.js';
export type { CoverageBreakdown, CoverageOptions, ImplementationStatus } from './coverage/rollup.js';
export { uncoveredAssertions, assertionTestMap } from './coverage/gaps.js';
export type { AssertionTest, AssertionTestMap, AssertionTests, TestRun } from './coverage/gaps.js';

export { GraphMutator } from './mutations/mutator.js';
export type { NewRequirement } from './mutations/mutator.js';
export { isRecognized } from './mutations/types.js';
export type { LoggedEntry, MutationEntry, MutationOperation, UnrecognizedEntry } from './mutations/types.js';

export { search, scopedSearch, discoverRequirements, rankedSearch } from './query/search.js';
export type {
  SearchMatch,
  SearchOptions,
  SearchField,
  ScopeDirection,
  RankedMatch,
  RankedSearchOptions,
} from './query/search.js';
export { parseQuery, isEmptyQuery } from './query/parse.js';
export type { ParsedQuery, SearchTerm } from './query/parse.js';
export { scoreRequirement, FIELD_WEIGHTS } from './query/score.js';
export { findAssertionsByKeywords } from './query/assertions.js';
export { minimizeRequirementSet } from './query/minimize.js';
export type { MinimizeResult } from './query/minimize.js';
export { getSubtree } from './query/subtree.js';
export type { Subtree, SubtreeFormat, SubtreeOptions } from './query/subtree.js';
export { CursorSession } from './query/cursor.js';
export type { CursorQuery, CursorItem, CursorInfo } from './query/cursor.js';

export { loadRecords, loadRecordFile } from './storage/files.js';
