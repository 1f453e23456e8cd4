/**
 * A 1-based location in a YAML source text.
 *
 * Both fields count from 1 so they can be shown to a user as-is
 * (e.g. `12:5`).
 */
export type SourcePosition = Readonly<{
  line: number;
  column: number;
}>;

/**
 * A location mark as produced by the parser (`LinePos` in the `yaml` package).
 * These are already 1-based.
 */
export type NativeMark = Readonly<{ line: number; col: number }>;

/**
 * A raw `[line, column]` tuple counting from 0, as derived from offsets.
 */
export type RawMark = readonly [line: number, column: number];

/**
 * One reported divergence between the left and the right YAML source.
 */
export type DiffRecord = Readonly<{
  /**
   * Description of the left-side value, or a placeholder such as
   * `<missing key>` when the left side has no corresponding node.
   */
  left: string;
  /**
   * Description of the right-side value, or a placeholder.
   */
  right: string;
  /**
   * Where the left-side description points to, if known.
   */
  leftPosition?: SourcePosition;
  /**
   * Where the right-side description points to, if known.
   */
  rightPosition?: SourcePosition;
}>;

/**
 * Leaf values of a parsed YAML tree.
 * Strings are always leaves; they are never traversed character by character.
 */
export type ScalarValue = string | number | boolean | bigint;

/**
 * Identity of a mapping key.
 *
 * Scalar keys keep their resolved value (so `1` and `"1"` stay distinct),
 * an empty key is `null` and complex keys are identified by their YAML text.
 */
export type MapKey = ScalarValue | null;

/**
 * Any value inside a parsed YAML tree. `null` is the YAML absent value.
 */
export type ParsedValue = null | ScalarValue | SourceMapping | SourceSequence;

/**
 * Position lookups available on a mapping node.
 */
export interface MappingPositions {
  /** Position of the mapping itself. */
  node(): SourcePosition | undefined;
  /** Position of the given key token. */
  key(key: MapKey): SourcePosition | undefined;
  /** Position of the value stored under the given key. */
  value(key: MapKey): SourcePosition | undefined;
}

/**
 * Position lookups available on a sequence node.
 */
export interface SequencePositions {
  /** Position of the sequence itself. */
  node(): SourcePosition | undefined;
  /** Position of the item at the given index. */
  item(index: number): SourcePosition | undefined;
}

/**
 * A mapping with unique keys, kept in source order.
 */
export type SourceMapping = {
  readonly type: 'mapping';
  readonly entries: ReadonlyMap<MapKey, ParsedValue>;
  readonly positions: MappingPositions;
};

/**
 * An ordered, index-addressed list of values.
 */
export type SourceSequence = {
  readonly type: 'sequence';
  readonly items: readonly ParsedValue[];
  readonly positions: SequencePositions;
};

/**
 * Any traversable node of the tree.
 */
export type SourceContainer = SourceMapping | SourceSequence;

/**
 * One document of a YAML stream.
 */
export type SourceDocument = {
  /**
   * The document's root value (`null` for an empty document).
   */
  readonly root: ParsedValue;
  /**
   * Where the document starts; used when the whole document is missing on
   * the other side, or when its root is a bare scalar.
   */
  readonly position?: SourcePosition;
};

/**
 * The four node kinds the differ distinguishes.
 */
export type NodeKind = 'absent' | 'mapping' | 'sequence' | 'scalar';

/**
 * Result of classifying a parsed value.
 * Each variant carries the narrowed payload so comparison sites can `switch`
 * on `kind` and get exhaustive handling.
 */
export type ClassifiedNode =
  | { readonly kind: 'absent' }
  | { readonly kind: 'mapping'; readonly node: SourceMapping }
  | { readonly kind: 'sequence'; readonly node: SourceSequence }
  | { readonly kind: 'scalar'; readonly value: ScalarValue };

/**
 * Identifies one of the two compared inputs.
 */
export type Side = 'left' | 'right';

export type StreamOptions = {
  /**
   * If true, the first document of each stream is treated as a header and
   * excluded from the comparison.
   *
   * **Notes:**
   * - Both streams must then contain at least two documents.
   * - Both sides are checked before failing, and every deficient side is
   *   named in the same error.
   */
  skipHeaderDoc: boolean;
};
