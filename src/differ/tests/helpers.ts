import type {
  DiffRecord,
  MapKey,
  ParsedValue,
  SourceDocument,
  SourceMapping,
  SourcePosition,
  SourceSequence,
  StreamOptions
} from '../types';
import { diffStreams } from '..';
import { createPosition } from '../utils';
import { loadYamlDocuments } from '../../loader';

/**
 * Diff Input
 * Two YAML texts plus optional stream options.
 */
export type DiffInput = {
  /**
   * The left YAML source.
   */
  left: string;

  /**
   * The right YAML source.
   */
  right: string;

  /**
   * Optional per-scenario stream options.
   */
  options?: Partial<StreamOptions>;
};

/**
 * Loads both texts and compares them as streams.
 */
export function runDiff(input: DiffInput): DiffRecord[] {
  return diffStreams(
    loadYamlDocuments(input.left, { side: 'left' }),
    loadYamlDocuments(input.right, { side: 'right' }),
    input.options
  );
}

/**
 * Loads the first document of a YAML text.
 */
export function loadDocument(source: string): SourceDocument {
  const [document] = loadYamlDocuments(source, { side: 'left' });
  if (!document) throw new Error('Expected at least one document');
  return document;
}

/**
 * Builds a mapping laid out like a block mapping starting at `start`:
 * entry `i` sits on line `start.line + i`, its value two columns after the
 * key text (`key: value`).
 */
export function mapping(
  entries: readonly (readonly [MapKey, ParsedValue])[],
  start: SourcePosition = createPosition(1, 1)
): SourceMapping {
  const keyPositions = new Map<MapKey, SourcePosition>();
  const valuePositions = new Map<MapKey, SourcePosition>();

  entries.forEach(([key], index) => {
    const line = start.line + index;
    keyPositions.set(key, createPosition(line, start.column));
    valuePositions.set(
      key,
      createPosition(line, start.column + String(key).length + 2)
    );
  });

  return {
    type: 'mapping',
    entries: new Map(entries),
    positions: {
      node: () => start,
      key: key => keyPositions.get(key),
      value: key => valuePositions.get(key)
    }
  };
}

/**
 * Builds a sequence laid out like a block sequence starting at `start`:
 * item `i` sits on line `start.line + i`, after the `- ` indicator.
 */
export function sequence(
  items: readonly ParsedValue[],
  start: SourcePosition = createPosition(1, 1)
): SourceSequence {
  return {
    type: 'sequence',
    items,
    positions: {
      node: () => start,
      item: index =>
        index < items.length
          ? createPosition(start.line + index, start.column + 2)
          : undefined
    }
  };
}

/**
 * Wraps a root value into a document starting at line 1.
 */
export function document(
  root: ParsedValue,
  position: SourcePosition = createPosition(1, 1)
): SourceDocument {
  return { root, position };
}
