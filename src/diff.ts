import { readFile } from 'node:fs/promises';

import type { DiffRecord, StreamOptions } from './differ/types';
import { diffStreams } from './differ/stream';
import { loadYamlDocuments } from './loader';
import { type Logger, silentLogger } from './utils/logger';

export type DiffOptions = Partial<StreamOptions> & {
  /**
   * Name of the left input in error messages (e.g. its file path).
   */
  leftName?: string;
  /**
   * Name of the right input in error messages.
   */
  rightName?: string;
  logger?: Logger;
};

/**
 * Compares two YAML sources semantically.
 *
 * Both sources are parsed completely (left first) before anything is
 * compared; a parse failure on either side aborts the call.
 *
 * @param leftSource - Left YAML text.
 * @param rightSource - Right YAML text.
 * @param options - Header skipping, display names and logger.
 * @returns The differences, or an empty array if the sources are identical.
 * @throws YamlParseError on malformed input.
 * @throws HeaderDocumentError if a header is requested but missing.
 */
export function diff(
  leftSource: string,
  rightSource: string,
  options: DiffOptions = {}
): DiffRecord[] {
  const logger = options.logger ?? silentLogger;

  const left = loadYamlDocuments(leftSource, {
    side: 'left',
    sourceName: options.leftName,
    logger
  });
  const right = loadYamlDocuments(rightSource, {
    side: 'right',
    sourceName: options.rightName,
    logger
  });

  const differences = diffStreams(left, right, {
    skipHeaderDoc: options.skipHeaderDoc ?? false
  });
  logger.debug('Comparison finished', { differences: differences.length });
  return differences;
}

/**
 * Compares two YAML files semantically.
 *
 * @param leftPath - Path of the left file.
 * @param rightPath - Path of the right file.
 * @param options - Header skipping and logger; names default to the paths.
 * @returns The differences, or an empty array if the files are identical.
 */
export async function diffFiles(
  leftPath: string,
  rightPath: string,
  options: DiffOptions = {}
): Promise<DiffRecord[]> {
  const [leftSource, rightSource] = await Promise.all([
    readFile(leftPath, 'utf8'),
    readFile(rightPath, 'utf8')
  ]);

  return diff(leftSource, rightSource, {
    leftName: leftPath,
    rightName: rightPath,
    ...options
  });
}
