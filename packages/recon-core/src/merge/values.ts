/**
 * Cell interpretation shared by the merge passes
 */

import type { CellValue } from '@pointrec/core';
import { toText } from '@pointrec/core';

const TRUE_TEXT = new Set(['true', '1', 'yes', 'y']);
const FALSE_TEXT = new Set(['false', '0', 'no', 'n', '']);

/**
 * Boolean reading of a flag cell, or `null` when it is missing or not a flag
 */
export function parseFlag(value: CellValue): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return null;
  }
  const text = toText(value);
  if (text === null) return null;
  const normalized = text.trim().toLowerCase();
  if (TRUE_TEXT.has(normalized)) return true;
  if (FALSE_TEXT.has(normalized)) return false;
  return null;
}

export function isTrueFlag(value: CellValue): boolean {
  return parseFlag(value) === true;
}

/**
 * `part / whole` as a percentage with one decimal, or `null` for an empty whole
 */
export function percentage(part: number, whole: number): number | null {
  if (whole === 0) return null;
  return Math.round((part / whole) * 1000) / 10;
}
