// Console-backed logging shared by every component.
// Components take a Logger through their options so tests can inject silent mocks.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

/** Logger that prefixes every line with `[LEVEL] [Component]`. Debug lines need ANALYSIS_DEBUG=1. */
export function createConsoleLogger(component: string): Logger {
  const debugEnabled = process.env.ANALYSIS_DEBUG === "1";
  return {
    debug: (msg, ...args) => {
      if (debugEnabled) console.log(`[DEBUG] [${ts()}] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`[INFO] [${ts()}] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${ts()}] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${ts()}] [${component}] ${msg}`, ...args),
  };
}
