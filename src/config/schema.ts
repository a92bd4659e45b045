import { z } from 'zod';

export const hashModeSchema = z.enum(['normalized-text', 'full-text']);

export const hashConfigSchema = z.object({
  mode: hashModeSchema.default('normalized-text'),
  length: z.number().int().min(4).max(64).default(8),
});

export const coverageConfigSchema = z.object({
  /** Roll child requirement assertion counts into parents. */
  strictMode: z.boolean().default(false),
  excludeStatus: z.array(z.string()).default(['Deprecated', 'Superseded', 'Draft']),
});

export const searchConfigSchema = z.object({
  defaultLimit: z.number().int().positive().default(50),
});

export const cursorConfigSchema = z.object({
  /** Item shape: -1 assertions as items, 0 inline with coverage, 1 adds children. */
  batchSize: z.number().int().min(-1).default(0),
});

export const reqgraphConfigSchema = z.object({
  idPrefix: z.string().default('REQ-'),
  hash: hashConfigSchema.default({}),
  coverage: coverageConfigSchema.default({}),
  search: searchConfigSchema.default({}),
  cursor: cursorConfigSchema.default({}),
});

export type ReqgraphConfig = z.infer<typeof reqgraphConfigSchema>;
export type ReqgraphConfigInput = z.input<typeof reqgraphConfigSchema>;
