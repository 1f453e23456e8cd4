import { Chalk, type ChalkInstance } from 'chalk';

import type { DiffRecord, SourcePosition } from '../differ/types';
import { config } from '../config';

export type PrintOptions = {
  /**
   * Width of each of the two columns.
   * @default 40
   */
  columnWidth?: number;
  /**
   * Text placed between the left and the right column.
   * @default '<->'
   */
  separator?: string;
  /**
   * Lines of source shown before and after each difference. Requires both
   * source texts; ignored otherwise.
   * @default 0
   */
  context?: number;
  leftSource?: string;
  rightSource?: string;
  /**
   * Emit ANSI colours.
   * @default true
   */
  color?: boolean;
};

type ResolvedPrintOptions = Required<
  Pick<PrintOptions, 'columnWidth' | 'separator' | 'context'>
> & { colors: ChalkInstance };

const ELLIPSIS = '...';

/**
 * Width taken by the `L` prefix, the position and the following space.
 */
const SIDE_PREFIX_WIDTH = 10;

function resolveOptions(options: PrintOptions): ResolvedPrintOptions {
  const hasSources =
    options.leftSource !== undefined && options.rightSource !== undefined;
  return {
    columnWidth: options.columnWidth ?? config.layout.fallbackColumnWidth,
    separator: options.separator ?? config.layout.separator,
    // Context needs both texts.
    context: hasSources ? (options.context ?? config.layout.defaultContext) : 0,
    colors: new Chalk({ level: options.color === false ? 0 : 1 })
  };
}

/**
 * Cuts `text` to `width` (ending in `placeholder` when cut) or pads it with
 * spaces to exactly `width`.
 *
 * @throws RangeError if `width` does not leave room beyond the placeholder.
 */
export function shortenAndPad(
  text: string,
  width: number,
  placeholder = ''
): string {
  if (width <= placeholder.length) {
    throw new RangeError(
      `Width ${width} is too small for placeholder "${placeholder}"`
    );
  }
  if (text.length > width) {
    return text.slice(0, width - placeholder.length) + placeholder;
  }
  return text.padEnd(width);
}

/**
 * Fits a path into `width` characters, keeping its end.
 */
export function fitPath(path: string, width: number): string {
  if (path.length <= width) return path.padEnd(width);
  return ELLIPSIS + path.slice(path.length - (width - ELLIPSIS.length));
}

/**
 * Formats a position as `line:col` in a fixed eight-character field.
 */
function formatPosition(position: SourcePosition | undefined): string {
  if (!position) return ' '.repeat(8);
  return `${String(position.line).padStart(4)}:${String(position.column).padEnd(3)}`;
}

function formatSide(
  prefix: 'L' | 'R',
  text: string,
  position: SourcePosition | undefined,
  columnWidth: number
): string {
  const body = shortenAndPad(text, columnWidth - SIDE_PREFIX_WIDTH, ELLIPSIS);
  return `${prefix}${formatPosition(position)} ${body}`;
}

/**
 * Formats one record as a single side-by-side line.
 *
 * @example
 * ```
 * L   3:8   1                     <->R   3:8   2
 * ```
 */
export function formatRecord(
  record: DiffRecord,
  columnWidth: number,
  separator: string
): string {
  return (
    formatSide('L', record.left, record.leftPosition, columnWidth) +
    separator +
    formatSide('R', record.right, record.rightPosition, columnWidth)
  );
}

function contextLine(
  lines: readonly string[],
  position: SourcePosition | undefined,
  offset: number,
  columnWidth: number
): string {
  const line = position ? lines[position.line - 1 + offset] : undefined;
  return line === undefined
    ? ' '.repeat(columnWidth)
    : shortenAndPad(line, columnWidth);
}

/**
 * Renders a list of records into printable lines.
 *
 * Without context, each record is one line. With context, each record line
 * is followed by the surrounding source lines of both sides (the line the
 * record points to is highlighted) and an empty line.
 *
 * @param records - The records to render, in order.
 * @param options - Layout and colour options.
 * @returns The lines, without trailing newlines.
 */
export function formatDiffs(
  records: readonly DiffRecord[],
  options: PrintOptions = {}
): string[] {
  const { columnWidth, separator, context, colors } = resolveOptions(options);
  const leftLines = options.leftSource?.split(/\r?\n/) ?? [];
  const rightLines = options.rightSource?.split(/\r?\n/) ?? [];
  const gap = ' '.repeat(separator.length);

  const output: string[] = [];
  for (const record of records) {
    const line = formatRecord(record, columnWidth, separator);
    if (context === 0) {
      output.push(line);
      continue;
    }

    output.push(colors.blue(line));
    for (let offset = -context; offset <= context; offset++) {
      const text =
        contextLine(leftLines, record.leftPosition, offset, columnWidth) +
        gap +
        contextLine(rightLines, record.rightPosition, offset, columnWidth);
      output.push(offset === 0 ? colors.red(text) : text);
    }
    output.push('');
  }
  return output;
}

/**
 * Formats the `L:<left path> R:<right path>` heading line.
 */
export function formatHeader(
  leftName: string,
  rightName: string,
  options: Pick<PrintOptions, 'columnWidth' | 'separator' | 'color'> = {}
): string {
  const { columnWidth, separator, colors } = resolveOptions(options);
  return colors.bold(
    `L:${fitPath(leftName, columnWidth - 2)}` +
      ' '.repeat(separator.length) +
      `R:${fitPath(rightName, columnWidth - 2)}`
  );
}

/**
 * Formats the closing summary line.
 */
export function formatSummary(
  count: number,
  options: Pick<PrintOptions, 'color'> = {}
): string {
  if (count === 0) return 'The given files are identical.';
  const { colors } = resolveOptions(options);
  return colors.bold(`${count} difference(s) found.`);
}

/**
 * Column width for a terminal of the given width: half the terminal minus
 * half the separator, at least the configured minimum. Unknown widths use
 * the fallback.
 */
export function computeColumnWidth(
  terminalColumns: number | undefined,
  separator: string = config.layout.separator
): number {
  if (terminalColumns === undefined || terminalColumns <= 0) {
    return config.layout.fallbackColumnWidth;
  }
  return Math.max(
    config.layout.minColumnWidth,
    Math.floor(terminalColumns / 2) - Math.floor(separator.length / 2) - 1
  );
}
