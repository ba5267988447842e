import fs from 'fs';
import { Config, loadConfig } from './config';

/**
 * Something that has a debug str
 */
export interface IHaveDebugStr {
  toDebugStr(): string;
}

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;
class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;
  private config: Pick<Config, 'debug' | 'debugFile'> | undefined;

  private constructor() {}

  /**
   * Replace the environment-derived settings, e.g. from command line flags.
   */
  configure(config: Pick<Config, 'debug' | 'debugFile'>) {
    this.config = config;
  }

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      listener(...args);
    }
    if (!this.config) {
      this.config = loadConfig();
    }
    if (this.config.debug) {
      console.log(...args);
    } else if (this.config.debugFile) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(this.config.debugFile, 'w');
      }
      fs.writeSync(this.debugFile, args.join(' ') + '\n');
    }
  }

  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args: unknown[]) =>
      logs.push(args.join(' '))
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enabled: boolean = true) {
  shouldUseColors = enabled;
}

// SGR parameters of the supported styles
const STYLES = {
  red: 31,
  green: 32,
};
type StyleName = keyof typeof STYLES;

function style(name: StyleName) {
  return (s: string): string =>
    shouldUseColors ? `\u001b[${STYLES[name]}m${s}\u001b[0m` : s;
}

export const colors: Record<StyleName, (s: string) => string> = {
  red: style('red'),
  green: style('green'),
};
