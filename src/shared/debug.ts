/**
 * Diagnostic output for the engine, written to stderr.
 *
 * REQGRAPH_DEBUG selects what is printed: `1`, `true` or `all` for every
 * area, or a comma-separated list such as `coverage,query`.
 */

export const DEBUG_CATEGORIES = [
  'build',
  'config',
  'coverage',
  'cursor',
  'mutation',
  'query',
  'storage',
] as const;

export type DebugCategory = (typeof DEBUG_CATEGORIES)[number];

export type DebugSink = (line: string) => void;

let active: ReadonlySet<DebugCategory> | null = null;
let sink: DebugSink = (line) => {
  process.stderr.write(line + '\n');
};

/**
 * Areas named by a REQGRAPH_DEBUG value. Unknown names are ignored.
 */
export function parseDebugSetting(raw: string | undefined): Set<DebugCategory> {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'all') return new Set(DEBUG_CATEGORIES);
  const names = value.split(',').map((name) => name.trim());
  return new Set(DEBUG_CATEGORIES.filter((category) => names.includes(category)));
}

function isActive(category: DebugCategory): boolean {
  active ??= parseDebugSetting(process.env.REQGRAPH_DEBUG);
  return active.has(category);
}

/**
 * Override the environment: `true` for every area, `false` for none, a
 * list for those areas, `null` to read REQGRAPH_DEBUG again.
 */
export function setDebugCategories(value: boolean | readonly DebugCategory[] | null): void {
  if (value === null) active = null;
  else if (value === true) active = new Set(DEBUG_CATEGORIES);
  else if (value === false) active = new Set();
  else active = new Set(value);
}

/** Redirect output; returns the previous sink. */
export function setDebugSink(next: DebugSink): DebugSink {
  const previous = sink;
  sink = next;
  return previous;
}

/**
 * `[ISO_TIMESTAMP] [REQGRAPH:category] message {json}`
 */
export function debug(category: DebugCategory, message: string, data?: Record<string, unknown>): void {
  if (!isActive(category)) return;

  const parts = [`[${new Date().toISOString()}]`, `[REQGRAPH:${category}]`, message];
  if (data !== undefined) parts.push(JSON.stringify(data));
  sink(parts.join(' '));
}

/**
 * Run `fn`, then log its elapsed time when the area is active. Failures
 * are logged too, and rethrown.
 */
export function debugTimed<T>(category: DebugCategory, message: string, fn: () => T): T {
  if (!isActive(category)) return fn();

  const start = performance.now();
  let failed = false;
  try {
    return fn();
  } catch (err: unknown) {
    failed = true;
    throw err;
  } finally {
    const elapsed = (performance.now() - start).toFixed(2);
    debug(category, `${message}${failed ? ' (failed)' : ''}`, { ms: Number(elapsed) });
  }
}
