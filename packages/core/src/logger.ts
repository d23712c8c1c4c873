export interface TideLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const noop = (): void => {};

export const silentLogger: TideLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

// Diagnostics go to stderr so stdout stays parseable.
export function createConsoleLogger(
  options: { verbose?: boolean; write?: (line: string) => void } = {},
): TideLogger {
  const write = options.write ?? ((line: string) => console.error(line));
  return {
    debug: options.verbose ? (message) => write(`debug: ${message}`) : noop,
    info: options.verbose ? (message) => write(`info: ${message}`) : noop,
    warn: (message) => write(`warn: ${message}`),
    error: (message) => write(`error: ${message}`),
  };
}
