import type {
  DiffRecord,
  Side,
  SourceDocument,
  StreamOptions
} from './types';

import { Placeholder, createDiffRecord, describeDocument } from './utils';
import { diffDocuments } from './tree';
import { HeaderDocumentError } from '../errors';

/**
 * Removes the header document from both streams.
 *
 * Both sides are checked before anything is thrown, so a single error names
 * every stream that lacks a header.
 *
 * @param left - Left documents.
 * @param right - Right documents.
 * @returns Both streams without their first document.
 * @throws HeaderDocumentError if either side has fewer than two documents.
 */
function dropHeaderDocuments(
  left: readonly SourceDocument[],
  right: readonly SourceDocument[]
): [readonly SourceDocument[], readonly SourceDocument[]] {
  const deficient: Side[] = [];
  if (left.length < 2) deficient.push('left');
  if (right.length < 2) deficient.push('right');

  if (deficient.length > 0) {
    throw new HeaderDocumentError(deficient);
  }

  return [left.slice(1), right.slice(1)];
}

/**
 * Calculates the differences between two YAML streams.
 *
 * Logic:
 * 1. Header: When `skipHeaderDoc` is set, the first document of each side
 *    is discarded (both sides must have one).
 * 2. Alignment: Documents are paired by index up to the longer stream.
 * 3. Missing Documents: A document present on one side only yields one
 *    `<no document>` record positioned at the existing document.
 * 4. Pairs: Delegated to `diffDocuments`; results keep document order.
 *
 * @param left - Parsed documents of the left stream.
 * @param right - Parsed documents of the right stream.
 * @param options - Stream options (`skipHeaderDoc`).
 * @returns All records, or an empty array if the streams are identical.
 * @throws HeaderDocumentError when a header is requested but missing.
 */
export function diffStreams(
  left: readonly SourceDocument[],
  right: readonly SourceDocument[],
  options: Partial<StreamOptions> = {}
): DiffRecord[] {
  const [leftDocuments, rightDocuments] = options.skipHeaderDoc
    ? dropHeaderDocuments(left, right)
    : [left, right];

  const differences: DiffRecord[] = [];
  const length = Math.max(leftDocuments.length, rightDocuments.length);

  for (let index = 0; index < length; index++) {
    const leftDocument = leftDocuments[index];
    const rightDocument = rightDocuments[index];

    if (leftDocument && rightDocument) {
      // No spread: the record list can exceed the argument limit.
      for (const record of diffDocuments(leftDocument, rightDocument)) {
        differences.push(record);
      }
    } else if (rightDocument) {
      differences.push(
        createDiffRecord(
          Placeholder.NoDocument,
          describeDocument(index),
          undefined,
          rightDocument.position
        )
      );
    } else if (leftDocument) {
      differences.push(
        createDiffRecord(
          describeDocument(index),
          Placeholder.NoDocument,
          leftDocument.position
        )
      );
    }
  }

  return differences;
}
