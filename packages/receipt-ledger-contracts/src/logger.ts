export type LedgerLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function createConsoleLogger(tag: string): LedgerLogger {
  return {
    info: (message) => console.log(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}

export const silentLogger: LedgerLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
