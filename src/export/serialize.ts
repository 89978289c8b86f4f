import { SerializationError } from '../errors.js';
import { isRecord } from '../jot.js';
import { canonicalize, compareCodeUnits } from '../utils/hash.js';

const INDENT = '  ';

/**
 * Pretty-printed JSON with object keys in code-unit order, two-space indent
 * and a trailing newline. Only JSON values are accepted: anything else means
 * the exported data is not what the data model promises.
 */
export function serializeJson(value: unknown, file: string): string {
  return `${stringify(value, file, '', [], new Set())}\n`;
}

function stringify(value: unknown, file: string, indent: string, pointer: string[], seen: Set<object>): string {
  const where = () => (pointer.length ? `/${pointer.join('/')}` : '(root)');

  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(file, `non-finite number at ${where()}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw new SerializationError(file, `unsupported ${typeof value} at ${where()}`);
  }
  if (seen.has(value)) {
    throw new SerializationError(file, `circular reference at ${where()}`);
  }

  const inner = indent + INDENT;
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      if (value.length === 0) {
        return '[]';
      }
      const items = value.map((item, index) => inner + stringify(item, file, inner, [...pointer, String(index)], seen));
      return `[\n${items.join(',\n')}\n${indent}]`;
    }

    if (!isRecord(value) || Object.getPrototypeOf(value) !== Object.prototype) {
      throw new SerializationError(file, `non-plain object at ${where()}`);
    }
    const record = value;
    const keys = Object.keys(record)
      .filter((key) => record[key] !== undefined)
      .sort(compareCodeUnits);
    if (keys.length === 0) {
      return '{}';
    }
    const members = keys.map(
      (key) => `${inner}${JSON.stringify(key)}: ${stringify(record[key], file, inner, [...pointer, key], seen)}`,
    );
    return `{\n${members.join(',\n')}\n${indent}}`;
  } finally {
    seen.delete(value);
  }
}

type SortValue = number | string;

function readSortValue(record: unknown, keyPath: readonly string[]): SortValue | undefined {
  let current: unknown = record;
  for (const key of keyPath) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return typeof current === 'number' || typeof current === 'string' ? current : undefined;
}

function compareSortValues(a: SortValue, b: SortValue): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'number') {
    return -1;
  }
  if (typeof b === 'number') {
    return 1;
  }
  return compareCodeUnits(a, b);
}

/** How the records of one array are ordered, including arrays nested in each record. */
export interface RecordOrder {
  /** Key path whose value orders the records. */
  by: readonly string[];
  /** Arrays held by each record under these properties, with their own order. */
  nested?: NestedOrder | undefined;
}

export type NestedOrder = Readonly<Record<string, RecordOrder>>;

/**
 * Orders records by the value at `order.by`, breaking ties by their canonical
 * JSON so that upstream ordering never reaches the output. Nested arrays are
 * ordered first, so ties compare settled content. Inputs are not mutated.
 */
export function sortRecords(records: readonly unknown[], order: RecordOrder, file: string): unknown[] {
  const keyed = records.map((original, index) => {
    const record = order.nested ? sortNested(original, order.nested, file) : original;
    const sortValue = readSortValue(record, order.by);
    if (sortValue === undefined) {
      throw new SerializationError(file, `record ${index} has no ${order.by.join('.')}`);
    }
    return { record, sortValue, canonical: canonicalize(record) };
  });

  keyed.sort(
    (a, b) => compareSortValues(a.sortValue, b.sortValue) || compareCodeUnits(a.canonical, b.canonical),
  );
  return keyed.map(({ record }) => record);
}

/** Applies `nested` to the arrays of a single record. Missing or non-array properties stay as they are. */
export function sortNested(record: unknown, nested: NestedOrder, file: string): unknown {
  if (!isRecord(record)) {
    return record;
  }
  const result: Record<string, unknown> = { ...record };
  for (const [property, order] of Object.entries(nested)) {
    const value = record[property];
    if (Array.isArray(value)) {
      result[property] = sortRecords(value, order, file);
    }
  }
  return result;
}
