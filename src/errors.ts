import type { Side } from './differ/types';

/**
 * Stable identifiers for every failure the package reports.
 */
export type YamlDiffErrorCode =
  | 'PARSE_FAILURE'
  | 'HEADER_SKIP_FAILURE'
  | 'UNKNOWN_NODE_KIND'
  | 'INVALID_OPTIONS';

/**
 * Base class of all errors thrown by the comparison.
 *
 * Callers can catch this single type and branch on `code`; no error is ever
 * reported as part of the difference list.
 */
export class YamlDiffError extends Error {
  readonly code: YamlDiffErrorCode;

  constructor(code: YamlDiffErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'YamlDiffError';
    this.code = code;
  }
}

export type YamlParseErrorDetails = {
  side: Side;
  /**
   * File name when known, otherwise the side name.
   */
  sourceName: string;
  line: number;
  column: number;
  /**
   * Error code reported by the parser (e.g. `DUPLICATE_KEY`).
   */
  parserCode: string;
  /**
   * The parser's diagnostic, without location context.
   */
  problem: string;
};

/**
 * Malformed input on one side. Raised before any comparison happens.
 */
export class YamlParseError extends YamlDiffError {
  readonly side: Side;
  readonly sourceName: string;
  readonly line: number;
  readonly column: number;
  readonly parserCode: string;
  readonly problem: string;

  constructor(details: YamlParseErrorDetails, options?: ErrorOptions) {
    super(
      'PARSE_FAILURE',
      `Error parsing YAML stream "${details.sourceName}":\n` +
        `${details.line}:${details.column} ${details.problem}`,
      options
    );
    this.name = 'YamlParseError';
    this.side = details.side;
    this.sourceName = details.sourceName;
    this.line = details.line;
    this.column = details.column;
    this.parserCode = details.parserCode;
    this.problem = details.problem;
  }
}

/**
 * Header skipping was requested but at least one stream has fewer than two
 * documents. Lists every deficient side.
 */
export class HeaderDocumentError extends YamlDiffError {
  readonly sides: readonly Side[];

  constructor(sides: readonly Side[]) {
    super(
      'HEADER_SKIP_FAILURE',
      `Cannot skip header: no header YAML document found in the ${sides.join(' and ')} stream`
    );
    this.name = 'HeaderDocumentError';
    this.sides = sides;
  }
}

/**
 * A value could not be placed in any of the four node kinds.
 * Signals a programming error, not bad input.
 */
export class UnknownNodeKindError extends YamlDiffError {
  constructor(detail: string) {
    super('UNKNOWN_NODE_KIND', `Unknown YAML node type: ${detail}`);
    this.name = 'UnknownNodeKindError';
  }
}

/**
 * Command-line options failed validation.
 */
export class OptionsError extends YamlDiffError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
    this.name = 'OptionsError';
  }
}
