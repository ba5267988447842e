/**
 * Settings read from the environment. Command line flags override them.
 */
export interface Config {
  /** Print debug logs to the console */
  readonly debug: boolean;
  /** Write debug logs to this file instead */
  readonly debugFile?: string;
  /** Colorize debug strings */
  readonly colors: boolean;
  /** Prefix for the state labels produced by subset construction */
  readonly labelPrefix: string;
}

export const DEFAULT_LABEL_PREFIX = 'D';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const debugFile = env.DEBUG_FILE?.trim();
  return {
    debug: isSet(env.DEBUG),
    debugFile: debugFile ? debugFile : undefined,
    colors: !isSet(env.NO_COLOR),
    labelPrefix: env.AUTOMATA_LABEL_PREFIX?.trim() || DEFAULT_LABEL_PREFIX,
  };
}

function isSet(value: string | undefined) {
  return value !== undefined && value !== '' && value !== '0';
}
