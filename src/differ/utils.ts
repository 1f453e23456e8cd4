import type {
  DiffRecord,
  NativeMark,
  NodeKind,
  ParsedValue,
  RawMark,
  SourcePosition
} from './types';

/**
 * Placeholder texts used when one side has no corresponding node.
 */
export const Placeholder = {
  MissingKey: '<missing key>',
  MissingItem: '<missing item>',
  NoDocument: '<no document>'
} as const;

/**
 * Creates an immutable 1-based position.
 *
 * @param line - Line number, counting from 1.
 * @param column - Column number, counting from 1.
 * @returns A frozen `SourcePosition`.
 * @throws RangeError if either value is not a positive integer.
 */
export function createPosition(line: number, column: number): SourcePosition {
  if (!Number.isInteger(line) || line < 1) {
    throw new RangeError(`Invalid line number: ${line}`);
  }
  if (!Number.isInteger(column) || column < 1) {
    throw new RangeError(`Invalid column number: ${column}`);
  }
  return Object.freeze({ line, column });
}

/**
 * Normalizes a parser mark into a `SourcePosition`.
 *
 * Accepted inputs:
 * 1. Parser-native mark (`{ line, col }`):
 *    The `yaml` package reports these 1-based already; used unchanged.
 * 2. Raw tuple (`[line, column]`):
 *    Counted from 0, shifted by one on both axes.
 *
 * @param mark - The mark to convert.
 * @returns A frozen `SourcePosition`.
 */
export function positionFromMark(mark: NativeMark | RawMark): SourcePosition {
  if (isRawMark(mark)) {
    return createPosition(mark[0] + 1, mark[1] + 1);
  }
  return createPosition(mark.line, mark.col);
}

function isRawMark(mark: NativeMark | RawMark): mark is RawMark {
  return Array.isArray(mark);
}

/**
 * Factory for `DiffRecord` objects.
 * Positions are only set when known, so records compare cleanly with
 * `toStrictEqual`.
 *
 * @param left - Left-side description.
 * @param right - Right-side description.
 * @param leftPosition - Where the left description points to.
 * @param rightPosition - Where the right description points to.
 * @returns A frozen record.
 */
export function createDiffRecord(
  left: string,
  right: string,
  leftPosition?: SourcePosition,
  rightPosition?: SourcePosition
): DiffRecord {
  return Object.freeze({
    left,
    right,
    ...(leftPosition && { leftPosition }),
    ...(rightPosition && { rightPosition })
  });
}

/**
 * Description of a node kind inside a container, e.g.
 * `<node of type mapping> spec`.
 *
 * @param kind - The node's kind.
 * @param key - The mapping key the node is stored under, if any.
 */
export function describeNodeKind(kind: NodeKind, key?: string): string {
  const label = `<node of type ${kind}>`;
  return key === undefined ? label : `${label} ${key}`;
}

/**
 * Description of a document root's kind, e.g. `<top-level node of type sequence>`.
 */
export function describeTopLevelKind(kind: NodeKind): string {
  return `<top-level node of type ${kind}>`;
}

/**
 * Label of a whole document in a stream (1-based).
 */
export function describeDocument(index: number): string {
  return `<YAML document #${index + 1}>`;
}

/**
 * Renders a parsed value as compact, single-line text.
 *
 * - `null` renders as `null`.
 * - Scalars use `String(value)`.
 * - Mappings render as `{key: value, ...}` and sequences as `[a, b]`,
 *   mirroring YAML flow style.
 *
 * @param value - Any parsed value.
 * @returns The single-line description.
 */
export function describeValue(value: ParsedValue): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return String(value);

  if (value.type === 'sequence') {
    return `[${value.items.map(describeValue).join(', ')}]`;
  }

  const entries: string[] = [];
  for (const [key, entry] of value.entries) {
    entries.push(`${String(key)}: ${describeValue(entry)}`);
  }
  return `{${entries.join(', ')}}`;
}
