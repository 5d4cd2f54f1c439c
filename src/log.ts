const RESET = "\x1b[0m";

export const COLOR = {
  gray: (s: string) => `\x1b[90m${s}${RESET}`,
  cyan: (s: string) => `\x1b[36m${s}${RESET}`,
  yellow: (s: string) => `\x1b[33m${s}${RESET}`,
  red: (s: string) => `\x1b[31m${s}${RESET}`,
};

export interface Logger {
  step(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  quiet?: boolean;
  logSteps?: boolean;
}

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function createLogger(opts: LoggerOptions = {}): Logger {
  const quiet = opts.quiet ?? false;
  const logSteps = !quiet && (opts.logSteps ?? true);
  return {
    step: (m) => { if (logSteps) console.log(`${COLOR.cyan("[plan]")} ${m}`); },
    info: (m) => { if (!quiet) console.log(`${COLOR.gray("[plan]")} ${m}`); },
    warn: (m) => { if (!quiet) console.warn(`${COLOR.yellow("[warn]")} ${m}`); },
    // errors are never silenced
    error: (m) => { console.error(`${COLOR.red("[error]")} ${m}`); },
  };
}

export const silentLogger: Logger = {
  step: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
