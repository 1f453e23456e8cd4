import { readFile } from 'node:fs/promises';

import { config, loadConfig } from '../config';
import { diff } from '../diff';
import { YamlDiffError } from '../errors';
import {
  computeColumnWidth,
  formatDiffs,
  formatHeader,
  formatSummary
} from '../printer';
import { createLogger, serializeError } from '../utils/logger';
import { USAGE, parseCliArgs } from './options';

/** Exit status for a finished comparison, identical or not. */
export const EXIT_OK = 0;
/** Exit status for bad options, unreadable files or broken YAML. */
export const EXIT_FAILURE = 2;

/**
 * Terminal capabilities and streams the command writes to.
 */
export type CliEnvironment = {
  stdout: Pick<NodeJS.WritableStream, 'write'>;
  stderr: Pick<NodeJS.WritableStream, 'write'>;
  /** Width of the terminal, if it is one. */
  terminalColumns?: number;
  env?: NodeJS.ProcessEnv;
  /** Reads a file as UTF-8 text. */
  readText?: (path: string) => Promise<string>;
};

/**
 * Runs the `yamldiff` command.
 *
 * @param argv - Arguments without the node binary and script path.
 * @param io - Streams and terminal information.
 * @returns The process exit status.
 */
export async function main(
  argv: readonly string[],
  io: CliEnvironment
): Promise<number> {
  const writeLine = (text: string) => io.stdout.write(`${text}\n`);
  const environment = loadConfig(io.env);
  let logger = createLogger({
    verbose: environment.verbose,
    stream: io.stderr
  });

  try {
    const command = parseCliArgs(argv, environment);
    if (command.kind === 'help') {
      writeLine(USAGE);
      return EXIT_OK;
    }
    if (command.kind === 'version') {
      writeLine(config.app.version);
      return EXIT_OK;
    }

    const { options } = command;
    logger = createLogger({ verbose: options.verbose, stream: io.stderr });
    logger.debug('Resolved options', options);

    const readText = io.readText ?? ((path: string) => readFile(path, 'utf8'));
    const [leftPath, rightPath] = options.files;
    const [leftSource, rightSource] = await Promise.all([
      readText(leftPath),
      readText(rightPath)
    ]);

    const differences = diff(leftSource, rightSource, {
      skipHeaderDoc: options.skipHeaderDoc,
      leftName: leftPath,
      rightName: rightPath,
      logger
    });

    if (differences.length === 0) {
      writeLine(formatSummary(0));
      return EXIT_OK;
    }

    const columnWidth = computeColumnWidth(io.terminalColumns);
    writeLine(
      formatHeader(leftPath, rightPath, { columnWidth, color: options.color })
    );
    for (const line of formatDiffs(differences, {
      columnWidth,
      context: options.context,
      leftSource,
      rightSource,
      color: options.color
    })) {
      writeLine(line);
    }
    writeLine(formatSummary(differences.length, { color: options.color }));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof YamlDiffError) {
      logger.debug('Comparison failed', serializeError(error));
      io.stderr.write(`${error.message}\n`);
      if (error.code === 'INVALID_OPTIONS') io.stderr.write(`\n${USAGE}\n`);
      return EXIT_FAILURE;
    }
    if (isFileSystemError(error)) {
      io.stderr.write(`Cannot read "${error.path}": ${error.code}\n`);
      return EXIT_FAILURE;
    }
    logger.error('Unexpected failure', error);
    throw error;
  }
}

function isFileSystemError(
  error: unknown
): error is NodeJS.ErrnoException & { path: string; code: string } {
  return (
    error instanceof Error &&
    typeof Reflect.get(error, 'code') === 'string' &&
    typeof Reflect.get(error, 'path') === 'string'
  );
}
