import type { StandardSchemaV1 } from '@standard-schema/spec';

import { OptionsError } from './errors';

/**
 * Renders a Standard Schema issue path as a dotted string.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string | undefined {
  if (!path || path.length === 0) return undefined;
  return path
    .map(segment =>
      typeof segment === 'object' ? String(segment.key) : String(segment)
    )
    .join('.');
}

/**
 * Validates and transforms raw input using a Standard Schema V1 compliant
 * validator (Zod, Valibot, ArkType, ...).
 *
 * The `~standard` property is the universal adapter: its `validate` returns
 * `{ value }` or `{ issues }` instead of throwing, so issues are checked here.
 *
 * @param schema - The schema instance.
 * @param input - The raw input (e.g. parsed command-line flags).
 * @param subject - What is being validated; used in error messages.
 * @returns The validated (and potentially transformed) value.
 *
 * @throws OptionsError
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails (the first issue is reported).
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  subject: string
): StandardSchemaV1.InferOutput<S>;

/**
 * Implementation Note - Overloads:
 * Inside the body `validate` is only known to return `unknown` values, so the
 * public signature above carries the inferred output type instead of casts.
 */
export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  subject: string
): unknown {
  const result = schema['~standard'].validate(input);

  // Option handling is synchronous.
  if (result instanceof Promise) {
    throw new OptionsError(
      `Async schema validation is not supported for ${subject}.`
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = formatIssuePath(firstIssue.path);
    throw new OptionsError(
      issuePath === undefined
        ? `Invalid ${subject}: ${firstIssue.message}`
        : `Invalid ${subject} at "${issuePath}": ${firstIssue.message}`
    );
  }

  if (result.issues === undefined) {
    return result.value;
  }

  throw new OptionsError(`Invalid ${subject}.`);
}
