import type {
  ClassifiedNode,
  DiffRecord,
  ScalarValue,
  SourceDocument,
  SourceMapping,
  SourcePosition,
  SourceSequence
} from './types';

import {
  Placeholder,
  createDiffRecord,
  describeNodeKind,
  describeTopLevelKind,
  describeValue
} from './utils';

import { classifyNode } from './classify';
import { UnknownNodeKindError } from '../errors';

/**
 * Where each side of a child pair lives and how it is labelled, so that
 * mapping values and sequence items share one comparison routine.
 */
type ChildContext = {
  leftPosition: SourcePosition | undefined;
  rightPosition: SourcePosition | undefined;
  /**
   * Mapping key appended to type-mismatch descriptions; absent for items.
   */
  key?: string;
};

/**
 * Exact comparison of an integer beyond float precision with a number.
 */
function isSameInteger(big: bigint, value: number): boolean {
  return Number.isInteger(value) && BigInt(value) === big;
}

/**
 * Compares two scalars the way YAML values compare: `1` equals `1.0`,
 * but `1` never equals `"1"`. Integers too large for a float are compared
 * exactly.
 */
function areScalarsEqual(left: ScalarValue, right: ScalarValue): boolean {
  // `.nan` on both sides is the same value.
  if (typeof left === 'number' && typeof right === 'number') {
    return left === right || (Number.isNaN(left) && Number.isNaN(right));
  }
  if (typeof left === 'bigint' && typeof right === 'number') {
    return isSameInteger(left, right);
  }
  if (typeof left === 'number' && typeof right === 'bigint') {
    return isSameInteger(right, left);
  }
  return left === right;
}

/**
 * Compares two nodes found at the same place below a container (a shared
 * mapping key or a shared sequence index).
 *
 * Logic:
 * 1. Kinds differ: emit one record naming both kinds. No recursion.
 * 2. Both absent: nothing to report.
 * 3. Both containers of the same kind: recurse.
 * 4. Both scalars: emit one record with both values when they differ.
 *
 * @param left - The classified left node.
 * @param right - The classified right node.
 * @param context - Positions and optional key label for this pair.
 * @returns The records found at this place or below.
 */
function compareChildren(
  left: ClassifiedNode,
  right: ClassifiedNode,
  context: ChildContext
): DiffRecord[] {
  if (left.kind !== right.kind) {
    return [
      createDiffRecord(
        describeNodeKind(left.kind, context.key),
        describeNodeKind(right.kind, context.key),
        context.leftPosition,
        context.rightPosition
      )
    ];
  }

  switch (left.kind) {
    case 'absent':
      return [];
    case 'mapping':
      return right.kind === 'mapping' ? diffMappings(left.node, right.node) : [];
    case 'sequence':
      return right.kind === 'sequence'
        ? diffSequences(left.node, right.node)
        : [];
    case 'scalar':
      if (right.kind !== 'scalar' || areScalarsEqual(left.value, right.value)) {
        return [];
      }
      return [
        createDiffRecord(
          String(left.value),
          String(right.value),
          context.leftPosition,
          context.rightPosition
        )
      ];
  }
}

/**
 * Calculates the differences between two mappings.
 *
 * Two passes, which fixes the reporting order:
 * 1. Left keys, in left order:
 *    - Missing on the right: one `<missing key>` record, no recursion.
 *    - Present on both: compare the two values (see `compareChildren`).
 * 2. Right keys, in right order:
 *    - Missing on the left: one `<missing key>` record.
 *    - Shared keys were handled in pass 1 and are skipped.
 *
 * @param left - The left mapping.
 * @param right - The right mapping.
 * @returns Records in left-key order, followed by right-only keys.
 */
export function diffMappings(
  left: SourceMapping,
  right: SourceMapping
): DiffRecord[] {
  const differences: DiffRecord[] = [];

  // Phase 1: removals and modifications, driven by the left side.
  for (const [key, leftValue] of left.entries) {
    if (!right.entries.has(key)) {
      differences.push(
        createDiffRecord(
          String(key),
          Placeholder.MissingKey,
          left.positions.key(key),
          right.positions.node()
        )
      );
      continue;
    }

    const rightValue = right.entries.get(key) ?? null;
    const childRecords = compareChildren(
      classifyNode(leftValue),
      classifyNode(rightValue),
      {
        leftPosition: left.positions.value(key),
        rightPosition: right.positions.value(key),
        key: String(key)
      }
    );
    for (const record of childRecords) differences.push(record);
  }

  // Phase 2: additions, driven by the right side.
  for (const key of right.entries.keys()) {
    if (!left.entries.has(key)) {
      differences.push(
        createDiffRecord(
          Placeholder.MissingKey,
          String(key),
          left.positions.node(),
          right.positions.key(key)
        )
      );
    }
  }

  return differences;
}

/**
 * Calculates the differences between two sequences, aligned strictly by
 * index. Moved items are reported as per-index changes.
 *
 * @param left - The left sequence.
 * @param right - The right sequence.
 * @returns Records in index order.
 */
export function diffSequences(
  left: SourceSequence,
  right: SourceSequence
): DiffRecord[] {
  const differences: DiffRecord[] = [];
  const length = Math.max(left.items.length, right.items.length);

  for (let index = 0; index < length; index++) {
    if (index >= left.items.length) {
      differences.push(
        createDiffRecord(
          Placeholder.MissingItem,
          describeValue(right.items[index] ?? null),
          left.positions.node(),
          right.positions.item(index)
        )
      );
      continue;
    }

    if (index >= right.items.length) {
      differences.push(
        createDiffRecord(
          describeValue(left.items[index] ?? null),
          Placeholder.MissingItem,
          left.positions.item(index),
          right.positions.node()
        )
      );
      continue;
    }

    const childRecords = compareChildren(
      classifyNode(left.items[index] ?? null),
      classifyNode(right.items[index] ?? null),
      {
        leftPosition: left.positions.item(index),
        rightPosition: right.positions.item(index)
      }
    );
    for (const record of childRecords) differences.push(record);
  }

  return differences;
}

/**
 * Position of a document's root node: the container's own position, or the
 * document's start for scalars. Absent roots have no position.
 */
function rootPosition(
  node: ClassifiedNode,
  document: SourceDocument
): SourcePosition | undefined {
  switch (node.kind) {
    case 'absent':
      return undefined;
    case 'mapping':
    case 'sequence':
      return node.node.positions.node() ?? document.position;
    case 'scalar':
      return document.position;
  }
}

/**
 * Calculates the differences between two parsed documents.
 *
 * Logic:
 * 1. Classification: Both roots are classified.
 * 2. Type Mismatch: One record naming both top-level kinds; nothing below a
 *    mismatch is compared.
 * 3. Containers: Delegates to `diffMappings` or `diffSequences`.
 * 4. Bare Scalars: One record when the values differ.
 * 5. Both Absent: Identical documents, no records.
 *
 * @param left - The left document.
 * @param right - The right document.
 * @returns The records for this document pair, or an empty array.
 * @throws UnknownNodeKindError if a root cannot be classified.
 */
export function diffDocuments(
  left: SourceDocument,
  right: SourceDocument
): DiffRecord[] {
  const leftNode = classifyNode(left.root);
  const rightNode = classifyNode(right.root);

  if (leftNode.kind !== rightNode.kind) {
    return [
      createDiffRecord(
        describeTopLevelKind(leftNode.kind),
        describeTopLevelKind(rightNode.kind),
        rootPosition(leftNode, left),
        rootPosition(rightNode, right)
      )
    ];
  }

  switch (leftNode.kind) {
    case 'absent':
      return [];
    case 'mapping':
      if (rightNode.kind === 'mapping') {
        return diffMappings(leftNode.node, rightNode.node);
      }
      break;
    case 'sequence':
      if (rightNode.kind === 'sequence') {
        return diffSequences(leftNode.node, rightNode.node);
      }
      break;
    case 'scalar':
      if (rightNode.kind === 'scalar') {
        return areScalarsEqual(leftNode.value, rightNode.value)
          ? []
          : [
              createDiffRecord(
                String(leftNode.value),
                String(rightNode.value),
                left.position,
                right.position
              )
            ];
      }
      break;
  }

  throw new UnknownNodeKindError(`top-level ${leftNode.kind}`);
}
