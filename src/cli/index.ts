#!/usr/bin/env node
/**
 * reqgraph CLI - builds the traceability graph from record files and
 * prints queries over it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config/loader.js';
import type { ReqgraphConfig } from '../config/schema.js';
import type { GraphFailure, Result } from '../core/errors.js';
import { EDGE_KINDS, NODE_KINDS, type EdgeKind, type NodeKind, type ValidationIssue } from '../core/types.js';
import { assertionTestMap, uncoveredAssertions } from '../coverage/gaps.js';
import { coverageBreakdown, implementationStatus } from '../coverage/rollup.js';
import { buildGraph, type BuiltGraph } from '../graph/factory.js';
import { toNodeView, type AssertionInContext } from '../graph/serialize.js';
import { findAssertionsByKeywords } from '../query/assertions.js';
import { minimizeRequirementSet } from '../query/minimize.js';
import { CursorSession, type CursorItem } from '../query/cursor.js';
import {
  discoverRequirements,
  rankedSearch,
  scopedSearch,
  search,
  type ScopeDirection,
  type SearchField,
} from '../query/search.js';
import { getSubtree, type SubtreeFormat } from '../query/subtree.js';
import { loadRecords } from '../storage/files.js';

interface GlobalOptions {
  records: string[];
  json?: boolean;
}

const program = new Command();

program
  .name('reqgraph')
  .description('Requirements traceability graph: coverage, search and subtree queries')
  .version('0.1.0')
  .option('-r, --records <paths...>', 'Record files or directories', ['requirements'])
  .option('--json', 'Print JSON instead of text');

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function die(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) die(describeFailure(result.error));
  return result.value;
}

function describeFailure(error: GraphFailure): string {
  return `${error.kind}: ${error.message}`;
}

function loadGraph(): { built: BuiltGraph; config: ReqgraphConfig } {
  try {
    const config = loadConfig();
    const built = buildGraph(loadRecords(globals().records), config);
    return { built, config };
  } catch (err: unknown) {
    die(err instanceof Error ? err.message : String(err));
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function splitList(value: string | undefined): string[] | undefined {
  return value?.split(',').map((t) => t.trim()).filter((t) => t.length > 0);
}

function parseChoice<T extends string>(value: string, allowed: readonly T[], what: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) die(`Invalid ${what}: ${value}. Must be one of: ${allowed.join(', ')}`);
  return match;
}

function printIssue(issue: ValidationIssue): void {
  const color = issue.severity === 'error' ? chalk.red : chalk.yellow;
  console.log(`  ${color(`[${issue.type}]`)} ${issue.message}`);
}

// Validate command
program
  .command('validate')
  .description('Report cycles, orphans, broken references and relationship mismatches')
  .action(() => {
    const { built } = loadGraph();
    const { report } = built;
    if (globals().json) {
      printJson(report);
    } else if (report.errors.length === 0 && report.warnings.length === 0) {
      console.log(chalk.green('No issues found'));
    } else {
      if (report.errors.length > 0) {
        console.log(chalk.red(`ERRORS (${report.errors.length}):`));
        report.errors.forEach(printIssue);
      }
      if (report.warnings.length > 0) {
        console.log(chalk.yellow(`WARNINGS (${report.warnings.length}):`));
        report.warnings.forEach(printIssue);
      }
    }
    if (!report.valid) process.exit(1);
  });

// Coverage command
program
  .command('coverage [id]')
  .description('Show coverage for every requirement, or the per-assertion breakdown of one')
  .action((id: string | undefined) => {
    const { built } = loadGraph();
    const { graph } = built;

    if (id) {
      const breakdown = unwrap(coverageBreakdown(graph, id));
      if (globals().json) {
        printJson(breakdown);
        return;
      }
      const { metrics } = breakdown;
      console.log(chalk.cyan(`${breakdown.requirementId} - ${implementationStatus(metrics)}`));
      console.log(
        chalk.gray(
          `${metrics.coveredAssertions}/${metrics.totalAssertions} assertions | ` +
            `${metrics.coveragePct.toFixed(1)}% (${metrics.indirectCoveragePct.toFixed(1)}% with indirect) | ` +
            `${metrics.passedTests}/${metrics.totalTests} tests passing`
        )
      );
      for (const assertion of breakdown.assertions) {
        const mark = assertion.covered ? chalk.green('✓') : chalk.red('✗');
        const sources = Array.from(new Set(assertion.contributions.map((c) => c.sourceType)));
        console.log(`  ${mark} ${assertion.label}. ${assertion.text} ${chalk.gray(sources.join(', '))}`);
      }
      return;
    }

    const rows = Array.from(graph.nodesByKind('requirement')).map((req) => ({
      id: req.id,
      title: req.label,
      status: req.rollup ? implementationStatus(req.rollup) : 'Unimplemented',
      coveragePct: req.rollup?.coveragePct ?? 0,
    }));
    if (globals().json) {
      printJson(rows);
      return;
    }
    for (const row of rows) {
      const color = row.status === 'Full' ? chalk.green : row.status === 'Partial' ? chalk.yellow : chalk.red;
      console.log(`${chalk.cyan(row.id)} ${color(`${row.coveragePct.toFixed(1)}%`)} - ${row.title}`);
    }
  });

function printAssertions(found: AssertionInContext[], empty: string): void {
  if (globals().json) {
    printJson(found);
    return;
  }
  if (found.length === 0) {
    console.log(chalk.green(empty));
    return;
  }
  let parent: string | null | undefined;
  for (const assertion of found) {
    if (assertion.parentId !== parent) {
      parent = assertion.parentId;
      console.log(chalk.cyan(`${parent ?? '(no parent)'} ${assertion.parentTitle ?? ''}`));
    }
    console.log(`  ${assertion.label}. ${assertion.text}`);
  }
}

// Uncovered command
program
  .command('uncovered [id]')
  .description('List assertions with no direct, explicit or inferred coverage')
  .action((id: string | undefined) => {
    const { built } = loadGraph();
    printAssertions(unwrap(uncoveredAssertions(built.graph, id)), 'Every assertion is covered');
  });

// Assertions command
program
  .command('assertions <keywords...>')
  .description('Find assertions whose text contains the keywords')
  .option('--any', 'Match any keyword instead of all of them')
  .action((keywords: string[], options: { any?: boolean }) => {
    const { built } = loadGraph();
    printAssertions(findAssertionsByKeywords(built.graph, keywords, !options.any), 'No matching assertions');
  });

// Tests command
program
  .command('tests <id>')
  .description('Show the tests behind each assertion of a requirement')
  .action((id: string) => {
    const { built } = loadGraph();
    const map = unwrap(assertionTestMap(built.graph, id));
    if (globals().json) {
      printJson(map);
      return;
    }
    console.log(
      chalk.cyan(`${map.requirementId} - ${map.coveredCount}/${map.totalAssertions} assertions tested`) +
        chalk.gray(` (${map.coveragePct.toFixed(1)}%)`)
    );
    for (const [label, { tests }] of Object.entries(map.assertionTests)) {
      const mark = tests.length > 0 ? chalk.green('✓') : chalk.red('✗');
      console.log(`  ${mark} ${label}`);
      for (const test of tests) {
        const where = test.file ? chalk.gray(` ${test.file}:${test.line ?? 0}`) : '';
        const runs = test.results.map((run) => run.status).join(', ');
        console.log(`      ${test.label}${where}${runs ? ` [${runs}]` : ''}`);
      }
    }
  });

// Get command
program
  .command('get <id>')
  .description('Get a specific node by ID')
  .action((id: string) => {
    const { built } = loadGraph();
    const node = built.graph.findById(id);
    if (!node) die(`Node not found: ${id}`);

    const view = toNodeView(node);
    if (globals().json) {
      printJson(view);
      return;
    }
    console.log(chalk.cyan(`${view.id} (${view.kind})`));
    console.log(chalk.bold(view.label));
    for (const assertion of view.assertions ?? []) {
      console.log(`  ${assertion.label}. ${assertion.text}`);
    }
    if (view.parents.length > 0) console.log(chalk.gray(`Parents: ${view.parents.join(', ')}`));
    if (view.children.length > 0) console.log(chalk.gray(`Children: ${view.children.join(', ')}`));
  });

interface SearchCommandOptions {
  field: string;
  regex?: boolean;
  limit?: string;
  scope?: string;
  direction: string;
  ranked?: boolean;
}

// Search command
program
  .command('search <query>')
  .description('Search requirements by id, title, body or keywords')
  .option('-f, --field <field>', 'Field to search (id, title, body, keywords, all)', 'all')
  .option('--regex', 'Treat the query as a regular expression')
  .option('-l, --limit <n>', 'Maximum matches (0 = unlimited)')
  .option('-s, --scope <id>', 'Only search nodes reachable from this node')
  .option('-d, --direction <direction>', 'Scope direction (descendants, ancestors)', 'descendants')
  .option('--ranked', 'Parse the query (AND, OR, (...), "phrase", -exclude, =exact) and rank by relevance')
  .action((query: string, options: SearchCommandOptions) => {
    const { built, config } = loadGraph();
    const field = parseChoice<SearchField>(options.field, ['id', 'title', 'body', 'keywords', 'all'], 'field');
    const searchOptions = {
      field,
      regex: options.regex ?? false,
      limit: options.limit === undefined ? config.search.defaultLimit : parseInt(options.limit, 10),
    };

    if (options.ranked) {
      if (options.regex || options.scope) die('--ranked cannot be combined with --regex or --scope');
      const ranked = rankedSearch(built.graph, query, { field, limit: searchOptions.limit });
      if (globals().json) {
        printJson(ranked);
      } else if (ranked.length === 0) {
        console.log(chalk.yellow('No matches'));
      } else {
        for (const match of ranked) {
          console.log(`${chalk.cyan(match.id)} - ${match.title} ${chalk.gray(`(${match.score})`)}`);
        }
      }
      return;
    }

    const matches = options.scope
      ? unwrap(
          scopedSearch(
            built.graph,
            query,
            options.scope,
            parseChoice<ScopeDirection>(options.direction, ['descendants', 'ancestors'], 'direction'),
            searchOptions
          )
        )
      : unwrap(search(built.graph, query, searchOptions));

    if (globals().json) {
      printJson(matches);
      return;
    }
    if (matches.length === 0) {
      console.log(chalk.yellow('No matches'));
      return;
    }
    for (const match of matches) {
      console.log(`${chalk.cyan(match.id)} - ${match.title} ${chalk.gray(`[${match.matchedField}]`)}`);
    }
  });

interface SubtreeCommandOptions {
  format: string;
  depth: string;
  kinds?: string;
}

// Subtree command
program
  .command('subtree <id>')
  .description('Show the subtree below a node')
  .option('-f, --format <format>', 'Output format (markdown, flat, nested)', 'markdown')
  .option('--depth <n>', 'Maximum depth (0 = unlimited)', '0')
  .option('-k, --kinds <kinds>', 'Comma-separated node kinds to include')
  .action((id: string, options: SubtreeCommandOptions) => {
    const { built } = loadGraph();
    const format = parseChoice<SubtreeFormat>(options.format, ['markdown', 'flat', 'nested'], 'format');
    const kinds = splitList(options.kinds)?.map((kind) => parseChoice<NodeKind>(kind, NODE_KINDS, 'kind'));
    const subtree = unwrap(getSubtree(built.graph, id, format, { depth: parseInt(options.depth, 10), kinds }));

    if (subtree.format === 'markdown' && !globals().json) {
      console.log(subtree.markdown);
      return;
    }
    printJson(subtree);
  });

// Discover command
program
  .command('discover <query> <scope>')
  .description('Search below (or above) a node and keep only the most specific matches')
  .option('-d, --direction <direction>', 'Scope direction (descendants, ancestors)', 'descendants')
  .option('--regex', 'Treat the query as a regular expression')
  .action((query: string, scope: string, options: { direction: string; regex?: boolean }) => {
    const { built } = loadGraph();
    const direction = parseChoice<ScopeDirection>(options.direction, ['descendants', 'ancestors'], 'direction');
    const result = unwrap(
      discoverRequirements(built.graph, query, scope, { direction, regex: options.regex ?? false, limit: 0 })
    );

    if (globals().json) {
      printJson(result);
      return;
    }
    for (const match of result.matches) {
      console.log(`${chalk.cyan(match.id)} - ${match.title} ${chalk.gray(`[${match.matchedField}]`)}`);
    }
    for (const { match, supersededBy } of result.pruned) {
      console.log(chalk.gray(`  ${match.id} superseded by ${supersededBy.join(', ')}`));
    }
  });

function printItem(item: CursorItem): void {
  const indent = '  '.repeat(item.depth ?? 0);
  const section = item.section ? chalk.gray(`[${item.section}] `) : '';
  const name = item.label === undefined ? item.title : `${item.label}. ${item.title}`;
  const coverage = item.coverage ? chalk.gray(` ${item.coverage.coveragePct.toFixed(1)}%`) : '';
  console.log(`${indent}${section}${chalk.cyan(item.id)} ${chalk.gray(`(${item.kind})`)} ${name}${coverage}`);
  for (const assertion of item.assertions ?? []) {
    console.log(`${indent}    ${assertion.label}. ${assertion.text}`);
  }
  if (item.children && item.children.length > 0) {
    console.log(chalk.gray(`${indent}    children: ${item.children.map((child) => child.id).join(', ')}`));
  }
}

interface BrowseCommandOptions {
  batchSize?: string;
  pageSize: string;
  hierarchy?: boolean;
}

// Browse command
program
  .command('browse <query>')
  .description('Page through search matches, or a requirement\'s hierarchy, with a cursor')
  .option('-b, --batch-size <n>', 'Item shape: -1 assertions as items, 0 inline, 1 with children (defaults to cursor.batchSize)')
  .option('-p, --page-size <n>', 'Items per page', '10')
  .option('--hierarchy', 'Treat the query as a requirement id and list its ancestors and children')
  .action((query: string, options: BrowseCommandOptions) => {
    const { built, config } = loadGraph();
    const batchSize = options.batchSize === undefined ? config.cursor.batchSize : parseInt(options.batchSize, 10);
    const pageSize = Math.max(parseInt(options.pageSize, 10) || 1, 1);
    const session = new CursorSession(built.graph, batchSize);
    const opened = unwrap(
      session.open(options.hierarchy ? { type: 'hierarchy', reqId: query } : { type: 'search', query, limit: 0 })
    );

    if (!opened.current) {
      console.log(chalk.yellow('No matches'));
      return;
    }
    console.log(chalk.green(`${opened.total} items`));
    printItem(opened.current);
    for (let page = unwrap(session.next(pageSize)); page.count > 0; page = unwrap(session.next(pageSize))) {
      console.log(chalk.gray(`-- ${page.remaining} remaining --`));
      page.items.forEach(printItem);
    }
    session.close();
  });

// Minimize command
program
  .command('minimize <ids...>')
  .description('Drop requirements implied by a more specific one in the set')
  .option('-e, --edge-kinds <kinds>', 'Comma-separated edge kinds to follow', 'implements,refines')
  .action((ids: string[], options: { edgeKinds: string }) => {
    const { built } = loadGraph();
    const edgeKinds = (splitList(options.edgeKinds) ?? []).map((kind) =>
      parseChoice<EdgeKind>(kind, EDGE_KINDS, 'edge kind')
    );
    const result = minimizeRequirementSet(built.graph, ids, edgeKinds);

    if (globals().json) {
      printJson(result);
      return;
    }
    console.log(chalk.green(`Minimal set (${result.stats.minimalCount}/${result.stats.inputCount}):`));
    for (const id of result.minimalSet) console.log(`  ${chalk.cyan(id)}`);
    for (const { id, supersededBy } of result.pruned) {
      console.log(chalk.gray(`  ${id} superseded by ${supersededBy.join(', ')}`));
    }
    for (const id of result.notFound) console.log(chalk.red(`  ${id} not found`));
  });

program.parse();
