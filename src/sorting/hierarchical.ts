/**
 * @module sorting/hierarchical
 *
 * Output ordering for extracted records. `source` keeps file order;
 * `hierarchical` groups nested objects, deepest first.
 */

import * as Maybe from '../functional/maybe.js';
import type { FunctionRecord } from '../annotations/types.js';

export const SORT_MODES = ['source', 'hierarchical'] as const;

export type SortMode = (typeof SORT_MODES)[number];

/** Share of records an object must own to count as the module's primary object */
export const PRIMARY_OBJECT_THRESHOLD = 0.3;

export interface NameHierarchy {
  /** Object levels below the module prefix */
  depth: number;
  objectPath: string;
  /** `objectPath` relative to the primary object */
  subPath: string;
  functionName: string;
}

export function countObjects(records: readonly FunctionRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const record of records) {
    const dot = record.name.indexOf('.');
    if (dot > 0) {
      const objectName = record.name.slice(0, dot);
      counts.set(objectName, (counts.get(objectName) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Most frequent leading name segment, if it covers at least 30% of records.
 * Ties go to the segment seen first.
 */
export function detectPrimaryObject(records: readonly FunctionRecord[]): Maybe.Maybe<string> {
  const threshold = Math.floor(records.length * PRIMARY_OBJECT_THRESHOLD);
  let best: Maybe.Maybe<string> = Maybe.Nothing;
  let bestCount = 0;
  for (const [objectName, count] of countObjects(records)) {
    if (count > bestCount && count >= threshold) {
      best = Maybe.Just(objectName);
      bestCount = count;
    }
  }
  return best;
}

export function parseHierarchicalName(name: string, primaryObject: Maybe.Maybe<string> = Maybe.Nothing): NameHierarchy {
  // "Module.func.ops.add" -> ["func", "ops", "add"]
  const withoutModule = name.includes('.') ? name.slice(name.indexOf('.') + 1) : name;
  const parts = withoutModule.split('.').filter((part) => part.length > 0);

  if (parts.length === 0) {
    return { depth: 0, objectPath: '', subPath: '', functionName: name };
  }

  const functionName = parts[parts.length - 1];
  const objectPath = parts.slice(0, -1).join('.');
  const primary = Maybe.fromMaybe('', primaryObject);

  let subPath = objectPath;
  if (primary && objectPath === primary) {
    subPath = '';
  } else if (primary && objectPath.startsWith(`${primary}.`)) {
    subPath = objectPath.slice(primary.length + 1);
  }

  return { depth: parts.length - 1, objectPath, subPath, functionName };
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Deeper hierarchies first, then object path, then function name.
 */
export function sortHierarchically(records: readonly FunctionRecord[]): FunctionRecord[] {
  const primary = detectPrimaryObject(records);
  return records
    .map((record) => ({ record, hierarchy: parseHierarchicalName(record.name, primary) }))
    .sort(
      (a, b) =>
        b.hierarchy.depth - a.hierarchy.depth ||
        compareText(a.hierarchy.objectPath, b.hierarchy.objectPath) ||
        compareText(a.hierarchy.functionName, b.hierarchy.functionName)
    )
    .map(({ record }) => record);
}

export function sortRecords(records: readonly FunctionRecord[], mode: SortMode): FunctionRecord[] {
  return mode === 'hierarchical' ? sortHierarchically(records) : [...records];
}
