import type { ClassifiedNode, ParsedValue, SourceContainer } from './types';
import { UnknownNodeKindError } from '../errors';

/**
 * Determines if a value is a traversable container (mapping or sequence)
 * rather than a scalar or the absent value.
 * Acts as a type guard to narrow `ParsedValue` to `SourceContainer`.
 *
 * @param value - The value to inspect.
 * @returns `true` if the value is a non-null object.
 */
export function isContainer(value: ParsedValue): value is SourceContainer {
  return typeof value === 'object' && value !== null;
}

/**
 * Places a parsed value into one of the four node kinds.
 *
 * Rules (first match wins):
 * 1. `null` (YAML null / no value) -> `absent`.
 * 2. A container tagged `mapping` -> `mapping`.
 * 3. A container tagged `sequence` -> `sequence`.
 * 4. Everything else -> `scalar`. Strings land here; they are never
 *    treated as a sequence of characters.
 *
 * @param value - Any value produced by the source loader.
 * @returns The classified node carrying the narrowed payload.
 * @throws UnknownNodeKindError if a container carries an unknown type tag.
 */
export function classifyNode(value: ParsedValue): ClassifiedNode {
  if (value === null) return { kind: 'absent' };
  if (!isContainer(value)) return { kind: 'scalar', value };

  switch (value.type) {
    case 'mapping':
      return { kind: 'mapping', node: value };
    case 'sequence':
      return { kind: 'sequence', node: value };
    default:
      return assertNeverContainer(value);
  }
}

function assertNeverContainer(value: never): never {
  const tag: unknown = Reflect.get(Object(value), 'type');
  throw new UnknownNodeKindError(String(tag));
}
