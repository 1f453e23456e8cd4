import { parseArgs } from 'node:util';
import { z } from 'zod';

import { type EnvironmentConfig, config } from '../config';
import { OptionsError } from '../errors';
import { validateWithSchema } from '../validator';

export const USAGE = `Usage: ${config.app.name} [options] <left> <right>

YAML Diff Tool: compares two YAML files semantically.

Arguments:
  left                   Left YAML file
  right                  Right YAML file

Options:
  -C, --context <n>      Number of lines of context to print with each difference (default: 0)
  -x, --skip-header-doc  Skip the first document with header information in the YAML stream
      --no-color         Disable coloured output
  -v, --verbose          Log diagnostics to stderr
  -h, --help             Show this help
      --version          Show the version`;

/**
 * Schema of the validated command-line options.
 */
const cliOptionsSchema = z.object({
  files: z.tuple([
    z.string().min(1, 'Left file path is empty'),
    z.string().min(1, 'Right file path is empty')
  ]),
  context: z.coerce
    .number()
    .int('Context must be a whole number')
    .nonnegative('Context must not be negative')
    .default(config.layout.defaultContext),
  skipHeaderDoc: z.boolean(),
  color: z.boolean(),
  verbose: z.boolean()
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'diff'; options: CliOptions };

/**
 * Tokenizes the argument vector. Unknown flags are rejected.
 */
function tokenize(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        context: { type: 'string', short: 'C' },
        'skip-header-doc': { type: 'boolean', short: 'x' },
        'no-color': { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' }
      }
    });
  } catch (error) {
    throw new OptionsError(
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Parses and validates the command line.
 *
 * Flags win over the environment: `--no-color` and `--verbose` can only
 * turn colour off and logging on.
 *
 * @param argv - Arguments without the node binary and script path.
 * @param env - Settings read from the environment.
 * @returns The command to run.
 * @throws OptionsError on unknown flags, a wrong number of files or an
 *   invalid context value.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: EnvironmentConfig
): CliCommand {
  const { values, positionals } = tokenize(argv);

  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (positionals.length !== 2) {
    throw new OptionsError(
      `Expected exactly two files to compare, received ${positionals.length}`
    );
  }

  const options = validateWithSchema(
    cliOptionsSchema,
    {
      files: positionals,
      context: values.context,
      skipHeaderDoc: values['skip-header-doc'] ?? false,
      color: env.color && !values['no-color'],
      verbose: env.verbose || (values.verbose ?? false)
    },
    'command-line options'
  );

  return { kind: 'diff', options };
}
