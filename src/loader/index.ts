import {
  LineCounter,
  Scalar,
  isAlias,
  isMap,
  isNode,
  isScalar,
  isSeq,
  parseAllDocuments,
  type Document,
  type YAMLError
} from 'yaml';

import type {
  MapKey,
  ParsedValue,
  Side,
  SourceDocument,
  SourceMapping,
  SourcePosition,
  SourceSequence
} from '../differ/types';
import { describeValue, positionFromMark } from '../differ/utils';
import { YamlParseError } from '../errors';
import { type Logger, silentLogger } from '../utils/logger';

export type LoadOptions = {
  /**
   * Which input is being loaded; reported in parse errors.
   */
  side: Side;
  /**
   * File name shown in parse errors. Defaults to the side name.
   */
  sourceName?: string;
  logger?: Logger;
};

/**
 * Per-document state shared by the conversion functions.
 */
type ConversionContext = {
  document: Document.Parsed;
  lineCounter: LineCounter;
  /**
   * Parser nodes on the current conversion path. An alias resolving to one
   * of these would recurse forever.
   */
  ancestors: ReadonlySet<unknown>;
};

type EntryPositions = {
  key: SourcePosition | undefined;
  value: SourcePosition | undefined;
};

type PairLike = { key: unknown; value: unknown };

/**
 * A mapping entry in source order: a written-out pair, or a `<<` merge
 * whose value names the mappings to pull keys from.
 */
type MappingItem =
  | { kind: 'pair'; key: MapKey; pair: PairLike }
  | { kind: 'merge'; sources: unknown };

/**
 * Resolves the start of a parser node to a 1-based position.
 *
 * @param node - Any parser value; non-nodes and nodes without range have no
 *   position.
 * @param lineCounter - Line index built while parsing.
 */
function startOf(
  node: unknown,
  lineCounter: LineCounter
): SourcePosition | undefined {
  if (!isNode(node) || !node.range) return undefined;
  return positionFromMark(lineCounter.linePos(node.range[0]));
}

/**
 * Turns a scalar's resolved value into a leaf value.
 * Values outside the leaf types (timestamps, binary) keep their text form.
 */
function toScalarValue(value: unknown): ParsedValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      // Integers are parsed as bigint; only those beyond float precision stay one.
      return Number.isSafeInteger(Number(value)) ? Number(value) : value;
    default:
      return String(value);
  }
}

/**
 * Identity of a mapping key: the resolved scalar value, or the compact text
 * of a complex key.
 */
function toMapKey(key: unknown, context: ConversionContext): MapKey {
  const value = toParsedValue(key, context);
  return typeof value === 'object' && value !== null
    ? describeValue(value)
    : value;
}

/**
 * Whether a pair key is the YAML 1.1 merge key (a plain `<<`).
 */
function isMergeKey(key: unknown): boolean {
  if (!isScalar(key)) return false;
  if (typeof key.value === 'symbol') return key.value.description === '<<';
  return key.value === '<<' && (!key.type || key.type === Scalar.PLAIN);
}

/**
 * The mappings a merge key pulls from: one mapping, or a sequence of them
 * (earlier ones take precedence). Other values contribute nothing.
 */
function mergeSources(
  value: unknown,
  context: ConversionContext
): SourceMapping[] {
  const merged = toParsedValue(value, context);
  if (typeof merged !== 'object' || merged === null) return [];
  if (merged.type === 'mapping') return [merged];
  return merged.items.filter(
    (item): item is SourceMapping =>
      typeof item === 'object' && item !== null && item.type === 'mapping'
  );
}

/**
 * Converts a mapping node.
 *
 * Logic:
 * 1. Keys: Written-out pairs are converted in source order.
 * 2. Merges: `<<` entries are expanded in place. A merged key never
 *    overrides a key written in this mapping or an earlier merge, and keeps
 *    the key and value positions of the mapping it came from.
 */
function toMapping(
  node: unknown,
  items: readonly unknown[],
  context: ConversionContext
): SourceMapping {
  const { lineCounter } = context;
  const entries = new Map<MapKey, ParsedValue>();
  const positions = new Map<MapKey, EntryPositions>();

  const mappingItems = items
    .filter(isPairLike)
    .map((pair): MappingItem =>
      isMergeKey(pair.key)
        ? { kind: 'merge', sources: pair.value }
        : { kind: 'pair', key: toMapKey(pair.key, context), pair }
    );
  const writtenKeys = new Set(
    mappingItems.flatMap(item => (item.kind === 'pair' ? [item.key] : []))
  );

  for (const item of mappingItems) {
    if (item.kind === 'pair') {
      const { key, pair } = item;
      const keyPosition = startOf(pair.key, lineCounter);
      entries.set(key, toParsedValue(pair.value, context));
      positions.set(key, {
        key: keyPosition,
        value: startOf(pair.value, lineCounter) ?? keyPosition
      });
      continue;
    }

    for (const source of mergeSources(item.sources, context)) {
      for (const [key, value] of source.entries) {
        if (writtenKeys.has(key) || entries.has(key)) continue;
        entries.set(key, value);
        positions.set(key, {
          key: source.positions.key(key),
          value: source.positions.value(key)
        });
      }
    }
  }

  const nodePosition = startOf(node, lineCounter);
  return {
    type: 'mapping',
    entries,
    positions: {
      node: () => nodePosition,
      key: key => positions.get(key)?.key,
      value: key => positions.get(key)?.value
    }
  };
}

function toSequence(
  node: unknown,
  items: readonly unknown[],
  context: ConversionContext
): SourceSequence {
  const { lineCounter } = context;
  const itemPositions = items.map(item => startOf(item, lineCounter));
  const nodePosition = startOf(node, lineCounter);

  return {
    type: 'sequence',
    items: items.map(item => toParsedValue(item, context)),
    positions: {
      node: () => nodePosition,
      item: index => itemPositions[index]
    }
  };
}

function isPairLike(value: unknown): value is PairLike {
  return typeof value === 'object' && value !== null && 'key' in value;
}

/**
 * Converts a parser node into the differ's tree.
 *
 * Logic:
 * 1. Aliases: Replaced by the node their anchor names. An alias pointing at
 *    one of its own ancestors is kept as its `*anchor` text.
 * 2. Scalars: Reduced to their resolved value (`null` for empty/null).
 * 3. Collections: Converted recursively, recording the position of every
 *    key, value and item.
 *
 * @param node - A parser node, or `null` for a missing value.
 * @param context - The document being converted.
 * @returns The converted value.
 */
function toParsedValue(node: unknown, context: ConversionContext): ParsedValue {
  if (isAlias(node)) {
    const target = node.resolve(context.document);
    if (context.ancestors.has(target)) return `*${node.source}`;
    return toParsedValue(target ?? null, context);
  }

  if (isScalar(node)) return toScalarValue(node.value);

  if (isMap(node) || isSeq(node)) {
    const nested: ConversionContext = {
      ...context,
      ancestors: new Set([...context.ancestors, node])
    };
    return isMap(node)
      ? toMapping(node, node.items, nested)
      : toSequence(node, node.items, nested);
  }

  return toScalarValue(node);
}

/**
 * Converts the first parser error into a `YamlParseError`.
 */
function toParseError(
  error: YAMLError,
  lineCounter: LineCounter,
  options: LoadOptions
): YamlParseError {
  const { line, col } = lineCounter.linePos(error.pos[0]);
  return new YamlParseError(
    {
      side: options.side,
      sourceName: options.sourceName ?? options.side,
      line: Math.max(line, 1),
      column: Math.max(col, 1),
      parserCode: error.code,
      problem: error.message
    },
    { cause: error }
  );
}

/**
 * Parses every document of a YAML stream and converts it for comparison.
 *
 * Logic:
 * 1. Parsing: `parseAllDocuments` with a `LineCounter`, so that every node
 *    offset can be mapped to a line and column. Integers are read exactly
 *    and `<<` merge keys are recognized.
 * 2. Validation: The first error of any document aborts the whole load;
 *    no partial stream is ever returned. Warnings are logged and ignored.
 * 3. Conversion: Each document's contents become a `SourceDocument`.
 *
 * @param source - The YAML text.
 * @param options - Side identity, display name and logger.
 * @returns The documents in stream order (empty for an empty stream).
 * @throws YamlParseError on malformed input.
 */
export function loadYamlDocuments(
  source: string,
  options: LoadOptions
): SourceDocument[] {
  const logger = options.logger ?? silentLogger;
  const lineCounter = new LineCounter();
  const documents = parseAllDocuments(source, {
    lineCounter,
    prettyErrors: false,
    intAsBigInt: true,
    merge: true
  });

  for (const document of documents) {
    const [firstError] = document.errors;
    if (firstError) {
      throw toParseError(firstError, lineCounter, options);
    }
    for (const warning of document.warnings) {
      logger.warn(`YAML warning in ${options.side} stream`, {
        code: warning.code,
        message: warning.message
      });
    }
  }

  logger.debug(`Loaded ${options.side} stream`, {
    source: options.sourceName ?? options.side,
    documents: documents.length
  });

  return documents.map(document => {
    const context: ConversionContext = {
      document,
      lineCounter,
      ancestors: new Set()
    };
    return {
      root: toParsedValue(document.contents, context),
      position:
        startOf(document.contents, lineCounter) ??
        positionFromMark(lineCounter.linePos(document.range[0]))
    };
  });
}
