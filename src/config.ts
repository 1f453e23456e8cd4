/**
 * Central configuration for yamldiff.
 * Layout constants live here; the environment can switch on debug logging
 * and switch off colour.
 */

/**
 * Parses an environment variable as a boolean with a default value.
 */
function envBool(
  env: NodeJS.ProcessEnv,
  key: string,
  defaultValue: boolean
): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Static configuration shared by the printer and the command line.
 */
export const config = {
  /** Application metadata */
  app: {
    name: 'yamldiff',
    version: '1.0.0'
  },

  /** Layout of the side-by-side output */
  layout: {
    /** Text placed between the left and right column */
    separator: '<->',
    /** Column width when the terminal size is unknown */
    fallbackColumnWidth: 40,
    /** Narrowest column the layout will use */
    minColumnWidth: 20,
    /** Lines of context printed around each difference */
    defaultContext: 0
  }
} as const;

/**
 * Settings taken from the environment.
 */
export type EnvironmentConfig = {
  /** `YAMLDIFF_DEBUG=true|1` enables debug logging. */
  verbose: boolean;
  /** Any non-empty `NO_COLOR` disables colour. */
  color: boolean;
};

/**
 * Reads the environment-dependent settings. Command-line flags override
 * these.
 *
 * @param env - The environment to read (defaults to `process.env`).
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig {
  return {
    verbose: envBool(env, 'YAMLDIFF_DEBUG', false),
    color: !env.NO_COLOR
  };
}
