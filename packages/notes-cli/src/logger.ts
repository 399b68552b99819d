import type { Logger } from '@notekeeper/core';

export type OutputStream = { write(chunk: string): unknown };

/**
 * Logger for terminal use. Everything goes to `stream` (stderr) so stdout
 * stays parseable; info and debug lines only appear with `--verbose`.
 */
export function createCliLogger(options: { stream: OutputStream; verbose: boolean }): Logger {
  const { stream, verbose } = options;
  const write = (message: string) => {
    stream.write(`${message}\n`);
  };
  const quiet = () => undefined;

  return {
    info: verbose ? write : quiet,
    warn: (message) => write(`Warning: ${message}`),
    error: (message) => write(`Error: ${message}`),
    debug: verbose ? write : quiet,
  };
}
