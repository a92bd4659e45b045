/**
 * One-call construction: records in, validated and coverage-annotated
 * graph out.
 */

import { defaultConfig } from '../config/loader.js';
import type { ReqgraphConfig } from '../config/schema.js';
import type { ParsedContent, ValidationReport } from '../core/types.js';
import { annotateCoverage } from '../coverage/rollup.js';
import { debugTimed } from '../shared/debug.js';
import { GraphBuilder } from './builder.js';
import type { TraceGraph } from './graph.js';
import { validateGraph } from './validate.js';

export interface BuiltGraph {
  graph: TraceGraph;
  report: ValidationReport;
}

export function buildGraph(
  records: Iterable<ParsedContent>,
  config: ReqgraphConfig = defaultConfig()
): BuiltGraph {
  return debugTimed('build', 'Graph constructed', () => {
    const builder = new GraphBuilder({ idPrefix: config.idPrefix, hash: config.hash });
    const graph = builder.addAll(records).build();
    const report = validateGraph(graph, builder.issues());
    annotateCoverage(graph, config.coverage);
    return { graph, report };
  });
}
