/**
 * Requirement content hashing.
 */

import { createHash } from 'node:crypto';
import type { AssertionData } from './types.js';

export type HashMode = 'normalized-text' | 'full-text';

export const HASH_MODES: readonly HashMode[] = ['normalized-text', 'full-text'];

export interface HashOptions {
  mode: HashMode;
  length: number;
}

export const DEFAULT_HASH_OPTIONS: HashOptions = { mode: 'normalized-text', length: 8 };

/**
 * `"<label>. <text>"` with internal whitespace collapsed.
 */
export function normalizeAssertionLine(label: string, text: string): string {
  return `${label}. ${text.replace(/\s+/g, ' ').trim()}`;
}

/**
 * Hash a requirement from its body and its assertions in physical order.
 *
 * normalized-text hashes only the normalized assertion lines, so body
 * edits and whitespace changes leave it stable. full-text hashes the body
 * followed by the raw assertion lines.
 */
export function computeRequirementHash(
  bodyText: string,
  assertions: readonly AssertionData[],
  options: HashOptions = DEFAULT_HASH_OPTIONS
): string {
  let material: string;
  if (options.mode === 'normalized-text') {
    material = assertions.map((a) => normalizeAssertionLine(a.label, a.text)).join('\n');
  } else {
    const lines = [...bodyText.split('\n'), ...assertions.map((a) => `${a.label}. ${a.text}`)];
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
      lines.pop();
    }
    material = lines.join('\n');
  }
  return createHash('sha256').update(material, 'utf8').digest('hex').slice(0, options.length);
}
