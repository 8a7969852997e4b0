import simpleGit, { SimpleGit } from 'simple-git';
import { createLogger } from './log';

const log = createLogger('git');

/**
 * Get the root directory of the git repository
 */
export async function getRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const git: SimpleGit = simpleGit(cwd);
  try {
    const root = await git.revparse(['--show-toplevel']);
    return root.trim();
  } catch (error) {
    throw new Error(`Not a git repository (or any parent): ${cwd}`);
  }
}

/**
 * Repository root when inside one, otherwise the directory itself
 */
export async function getProjectRoot(cwd: string = process.cwd()): Promise<string> {
  try {
    return await getRepoRoot(cwd);
  } catch (error) {
    log.debug(`Using ${cwd} as project root (${error instanceof Error ? error.message : String(error)})`);
    return cwd;
  }
}
