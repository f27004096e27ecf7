// Minimal stderr logger. Stdout is reserved for formatted text and the MCP protocol.

export interface Logger {
  debug(message: string): void;
}

export type LogSink = (line: string) => void;

const toStderr: LogSink = (line) => console.error(line);

export const silentLogger: Logger = {
  debug() {},
};

export function createLogger(scope: string, opts: { debug?: boolean; sink?: LogSink } = {}): Logger {
  const sink = opts.sink ?? toStderr;
  const prefix = `[fmtlatex:${scope}]`;
  return {
    debug(message) {
      if (opts.debug) sink(`${prefix} ${message}`);
    },
  };
}
