import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import type { AutoBackupSettings, ChangeVerdict, FileBaseline } from '@promptlink/types';
import { createLogger } from './log';
import { countTokens } from './tokens';

const log = createLogger('detector');

export type TokenCounter = (text: string) => number;

export const hashContent = (content: string): string => createHash('md5').update(content, 'utf-8').digest('hex');

const escapeRegex = (text: string): string => text.replace(/[.+^${}()|\\/]/g, '\\$&');

/**
 * Shell-style glob: `*`, `?` and `[...]` / `[!...]`, matched against the
 * whole name
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith('^')) {
        body = `\\${body}`;
      }
      source += `[${body}]`;
      i = close;
    } else {
      source += escapeRegex(char);
    }
  }
  return new RegExp(`^${source}$`);
}

export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}

const isInside = (filePath: string, folder: string): boolean =>
  filePath === folder || filePath.startsWith(folder.endsWith(path.sep) ? folder : folder + path.sep);

/**
 * Decides whether a file change is worth recording. Keeps a (hash, tokens)
 * baseline per path for as long as the detector lives, so the first change
 * seen for any file is always significant.
 */
export class ChangeDetector {
  private readonly baselines = new Map<string, FileBaseline>();
  private readonly excludedDirs: string[];

  /**
   * @param excludedDirs - never monitored, even inside a monitored folder;
   * the data directory belongs here so store and backup writes are not
   * picked up as project changes
   */
  constructor(
    private settings: AutoBackupSettings,
    private readonly tokenCounter: TokenCounter = countTokens,
    excludedDirs: readonly string[] = []
  ) {
    this.excludedDirs = excludedDirs.map(dir => path.resolve(dir));
  }

  updateSettings(settings: AutoBackupSettings): void {
    this.settings = settings;
  }

  baselineFor(filePath: string): FileBaseline | undefined {
    return this.baselines.get(path.resolve(filePath));
  }

  countTokens(content: string): number {
    return this.tokenCounter(content);
  }

  isExcluded(filePath: string): boolean {
    const resolved = path.resolve(filePath);
    return this.excludedDirs.some(dir => isInside(resolved, dir));
  }

  /**
   * Exact member of the monitored files, or inside a monitored folder with a
   * base name that matches no ignore pattern. Excluded directories never
   * qualify.
   */
  shouldMonitor(filePath: string): boolean {
    const resolved = path.resolve(filePath);
    if (this.isExcluded(resolved)) {
      return false;
    }
    if (this.settings.monitorFiles.some(file => path.resolve(file) === resolved)) {
      return true;
    }
    const inFolder = this.settings.monitorFolders.some(folder => isInside(resolved, path.resolve(folder)));
    if (!inFolder) {
      return false;
    }
    const name = path.basename(resolved);
    return !this.settings.ignoredPatterns.some(pattern => matchesGlob(name, pattern));
  }

  /**
   * Compare content against the baseline and advance it. With no baseline
   * the change is significant and its delta is the full token count.
   */
  evaluate(filePath: string, content: string): ChangeVerdict {
    const key = path.resolve(filePath);
    const hash = hashContent(content);
    const tokens = this.tokenCounter(content);
    const baseline = this.baselines.get(key);

    if (!baseline) {
      this.baselines.set(key, { hash, tokens });
      return { path: key, significant: true, tokenChange: tokens, tokens };
    }

    if (baseline.hash === hash) {
      return { path: key, significant: false, tokenChange: 0, tokens };
    }

    const tokenChange = tokens - baseline.tokens;
    this.baselines.set(key, { hash, tokens });
    return {
      path: key,
      significant: Math.abs(tokenChange) >= this.settings.minTokenChange,
      tokenChange,
      tokens,
    };
  }

  /**
   * Read and evaluate a file. Returns null when it cannot be read.
   */
  evaluateFile(filePath: string): ChangeVerdict | null {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      log.warn(`Skipping ${filePath}, could not read it`, error);
      return null;
    }
    return this.evaluate(filePath, content);
  }
}

export function cooldownActive(lastBackup: Date | null, cooldownMinutes: number, now: Date = new Date()): boolean {
  if (!lastBackup) {
    return false;
  }
  return now.getTime() - lastBackup.getTime() < cooldownMinutes * 60 * 1000;
}

export function cooldownRemainingMinutes(
  lastBackup: Date | null,
  cooldownMinutes: number,
  now: Date = new Date()
): number {
  if (!lastBackup) {
    return 0;
  }
  const remaining = cooldownMinutes - (now.getTime() - lastBackup.getTime()) / 60000;
  return remaining > 0 ? remaining : 0;
}
