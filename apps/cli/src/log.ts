import kleur from 'kleur';

/**
 * Tagged console logger: `[promptlink watch] message`.
 * Info goes to stdout, warnings and errors to stderr. Debug lines only
 * print when PROMPTLINK_DEBUG is set.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}

const isDebugEnabled = (): boolean => {
  const value = (process.env.PROMPTLINK_DEBUG || '').toLowerCase();
  return value === '1' || value === 'true';
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export function createLogger(tag: string): Logger {
  const prefix = `[promptlink ${tag}]`;

  return {
    debug(message: string): void {
      if (isDebugEnabled()) {
        console.log(kleur.gray(`${prefix} ${message}`));
      }
    },
    info(message: string): void {
      console.log(`${prefix} ${message}`);
    },
    warn(message: string, error?: unknown): void {
      const suffix = error === undefined ? '' : `: ${describeError(error)}`;
      console.warn(kleur.yellow(`${prefix} ${message}${suffix}`));
    },
    error(message: string, error?: unknown): void {
      console.error(kleur.red(`${prefix} ${message}`));
      if (error !== undefined) {
        // Full detail (stack included) stays in the log, never in command output.
        console.error(error);
      }
    },
  };
}
