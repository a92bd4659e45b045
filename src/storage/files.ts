/**
 * Record files: YAML documents holding the parsed-content records the
 * graph is built from.
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { RecordFileError } from '../core/errors.js';
import type { ParsedContent } from '../core/types.js';
import { debug } from '../shared/debug.js';

const stringList = z.array(z.string()).optional();

const baseFields = {
  startLine: z.number().int().nonnegative().default(0),
  endLine: z.number().int().nonnegative().optional(),
  rawText: z.string().optional(),
  sourceContext: z.object({ sourceId: z.string() }).optional(),
};

const requirementRecord = z.object({
  ...baseFields,
  contentType: z.literal('requirement'),
  parsedData: z.object({
    id: z.string().min(1),
    title: z.string().optional(),
    level: z.string().optional(),
    status: z.string().optional(),
    hash: z.string().optional(),
    body: z.string().optional(),
    keywords: stringList,
    assertions: z.array(z.object({ label: z.string().min(1), text: z.string() })).optional(),
    implements: stringList,
    refines: stringList,
    addresses: stringList,
  }),
});

const journeyRecord = z.object({
  ...baseFields,
  contentType: z.literal('journey'),
  parsedData: z.object({
    id: z.string().min(1),
    title: z.string().optional(),
    actor: z.string().optional(),
    goal: z.string().optional(),
  }),
});

const codeRecord = z.object({
  ...baseFields,
  contentType: z.literal('code_ref'),
  parsedData: z.object({
    implements: stringList,
    functionName: z.string().optional(),
    className: z.string().optional(),
  }),
});

const testRecord = z.object({
  ...baseFields,
  contentType: z.literal('test_ref'),
  parsedData: z.object({
    id: z.string().optional(),
    validates: stringList,
    functionName: z.string().optional(),
    className: z.string().optional(),
  }),
});

const resultRecord = z.object({
  ...baseFields,
  contentType: z.literal('test_result'),
  parsedData: z.object({
    id: z.string().min(1),
    testId: z.string().optional(),
    status: z.string().optional(),
    duration: z.number().optional(),
    message: z.string().optional(),
  }),
});

const remainderRecord = z.object({
  ...baseFields,
  contentType: z.literal('remainder'),
  parsedData: z.object({ id: z.string().optional(), text: z.string().optional() }),
});

export const parsedContentSchema = z.discriminatedUnion('contentType', [
  requirementRecord,
  journeyRecord,
  codeRecord,
  testRecord,
  resultRecord,
  remainderRecord,
]);

/** A file is either a bare list of records or `{ records: [...] }`. */
const recordFileSchema = z.union([
  z.array(parsedContentSchema),
  z.object({ records: z.array(parsedContentSchema) }).transform((doc) => doc.records),
]);

/**
 * Load the records in one YAML file. Records without a source context
 * are attributed to the file itself.
 */
export function loadRecordFile(filePath: string): ParsedContent[] {
  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RecordFileError(`Cannot read records from ${filePath}: ${reason}`, filePath);
  }

  const result = recordFileSchema.safeParse(raw ?? []);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RecordFileError(`Invalid records in ${filePath}: ${issues}`, filePath);
  }

  const records: ParsedContent[] = result.data.map((record) => ({
    ...record,
    sourceContext: record.sourceContext ?? { sourceId: filePath },
  }));
  debug('storage', 'Loaded record file', { filePath, records: records.length });
  return records;
}

/**
 * Load every `.yaml`/`.yml` file under `dir`, recursively, in sorted
 * path order.
 */
export function loadRecordDir(dir: string): ParsedContent[] {
  const records: ParsedContent[] = [];

  function walkDir(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true }).sort((a, b) =>
      a.name.localeCompare(b.name)
    );
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        walkDir(fullPath);
      } else if (entry.name.endsWith('.yaml') || entry.name.endsWith('.yml')) {
        records.push(...loadRecordFile(fullPath));
      }
    }
  }

  if (existsSync(dir)) {
    walkDir(dir);
  }

  return records;
}

/**
 * Load records from a mix of files and directories.
 */
export function loadRecords(paths: readonly string[]): ParsedContent[] {
  return paths.flatMap((path) => {
    if (!existsSync(path)) {
      throw new RecordFileError(`No such file or directory: ${path}`, path);
    }
    return statSync(path).isDirectory() ? loadRecordDir(path) : loadRecordFile(path);
  });
}
