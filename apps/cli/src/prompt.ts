import * as readline from 'readline/promises';

export interface ConfirmOptions {
  /** Skip the question and answer yes */
  assumeYes?: boolean;
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

/**
 * Ask a y/N question on the terminal. Without a TTY nobody can answer, so
 * the answer is no.
 */
export const confirm = async (message: string, options: ConfirmOptions = {}): Promise<boolean> => {
  if (options.assumeYes) {
    return true;
  }
  const input = options.input ?? process.stdin;
  if (!input.isTTY) {
    return false;
  }
  const rl = readline.createInterface({
    input,
    output: options.output ?? process.stdout,
  });
  try {
    const answer = await rl.question(`${message} (y/N): `);
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
};
