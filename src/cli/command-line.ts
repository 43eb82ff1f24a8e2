export const USAGE = 'Usage: file-metrics <sequential|parallel|benchmark> <file...>';

export interface CommandLine {
  mode: string;
  paths: string[];
}

/**
 * `<mode> <file...>`. The mode token is validated by the batch use case;
 * this only checks that something was given.
 */
export function parseCommandLine(args: readonly string[]): CommandLine {
  const [mode, ...paths] = args;
  if (mode === undefined || mode.trim() === '') {
    throw new Error(`Missing mode. ${USAGE}`);
  }
  return { mode, paths };
}
