export interface Logger {
  info(message: string): void;
  debug(message: string): void;
}

const PREFIX = '[srctar]';

export function isVerbose(env: Record<string, string | undefined> = process.env) {
  const raw = env.SRCTAR_VERBOSE?.trim().toLowerCase();
  return raw === '1' || raw === 'true' || raw === 'yes';
}

export function createLogger(
  options: { verbose?: boolean; write?: (line: string) => void } = {},
): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(line));
  const verbose = options.verbose ?? isVerbose();

  return {
    info(message) {
      write(`${PREFIX} ${message}\n`);
    },
    debug(message) {
      if (verbose) {
        write(`${PREFIX} ${message}\n`);
      }
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  debug() {},
};
