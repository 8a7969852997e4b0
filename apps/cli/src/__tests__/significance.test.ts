import * as fs from 'fs';
import * as path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  ChangeDetector,
  cooldownActive,
  cooldownRemainingMinutes,
  globToRegExp,
  hashContent,
  matchesGlob,
} from '../significance';
import { cleanupTempDirs, countWordsForTest, makeTempDir, settingsWith, words } from './helpers';

afterEach(() => {
  cleanupTempDirs();
});

describe('ChangeDetector.evaluate', () => {
  const detector = () => new ChangeDetector(settingsWith({ minTokenChange: 50 }), countWordsForTest);

  it('treats the first observation as significant with the full count as delta', () => {
    expect(detector().evaluate('/p/a.txt', words(12))).toEqual({
      path: path.resolve('/p/a.txt'),
      significant: true,
      tokenChange: 12,
      tokens: 12,
    });
  });

  it('is not significant one token below the threshold', () => {
    const d = detector();
    d.evaluate('/p/a.txt', words(100));
    const verdict = d.evaluate('/p/a.txt', words(149));
    expect(verdict.significant).toBe(false);
    expect(verdict.tokenChange).toBe(49);
  });

  it('is significant at exactly the threshold', () => {
    const d = detector();
    d.evaluate('/p/a.txt', words(100));
    const verdict = d.evaluate('/p/a.txt', words(150));
    expect(verdict.significant).toBe(true);
    expect(verdict.tokenChange).toBe(50);
  });

  it('counts shrinking files by magnitude', () => {
    const d = detector();
    d.evaluate('/p/a.txt', words(100));
    expect(d.evaluate('/p/a.txt', words(40))).toMatchObject({ significant: true, tokenChange: -60 });
  });

  it('reports unchanged content as an insignificant zero delta', () => {
    const d = detector();
    d.evaluate('/p/a.txt', words(100));
    expect(d.evaluate('/p/a.txt', words(100))).toMatchObject({ significant: false, tokenChange: 0, tokens: 100 });
  });

  it('advances the baseline after every changed observation', () => {
    const d = detector();
    d.evaluate('/p/a.txt', words(100));
    d.evaluate('/p/a.txt', words(130));
    expect(d.baselineFor('/p/a.txt')).toEqual({ hash: hashContent(words(130)), tokens: 130 });
    expect(d.evaluate('/p/a.txt', words(160)).tokenChange).toBe(30);
  });

  it('starts every detector with an empty baseline', () => {
    detector().evaluate('/p/a.txt', words(100));
    expect(detector().evaluate('/p/a.txt', words(101)).significant).toBe(true);
  });
});

describe('ChangeDetector.evaluateFile', () => {
  it('returns null for a file it cannot read', () => {
    const d = new ChangeDetector(settingsWith(), countWordsForTest);
    expect(d.evaluateFile(path.join(makeTempDir(), 'missing.txt'))).toBeNull();
  });

  it('reads the file from disk', () => {
    const file = path.join(makeTempDir(), 'a.txt');
    fs.writeFileSync(file, 'one two three');
    const d = new ChangeDetector(settingsWith(), countWordsForTest);
    expect(d.evaluateFile(file)?.tokens).toBe(3);
  });
});

describe('ChangeDetector.shouldMonitor', () => {
  const d = new ChangeDetector(
    settingsWith({
      monitorFolders: ['/work/src'],
      monitorFiles: ['/work/notes.tmp'],
      ignoredPatterns: ['*.tmp', '*~'],
    })
  );

  it('accepts files inside a monitored folder', () => {
    expect(d.shouldMonitor('/work/src/deep/a.ts')).toBe(true);
  });

  it('does not treat a sibling with the same prefix as inside', () => {
    expect(d.shouldMonitor('/work/src-old/a.ts')).toBe(false);
  });

  it('applies ignore patterns to folder members', () => {
    expect(d.shouldMonitor('/work/src/scratch.tmp')).toBe(false);
    expect(d.shouldMonitor('/work/src/a.ts~')).toBe(false);
  });

  it('always accepts explicitly monitored files', () => {
    expect(d.shouldMonitor('/work/notes.tmp')).toBe(true);
  });
});

describe('globs', () => {
  it('supports star, question mark and classes', () => {
    expect(matchesGlob('a.tmp', '*.tmp')).toBe(true);
    expect(matchesGlob('a.tmpx', '*.tmp')).toBe(false);
    expect(matchesGlob('ab', 'a?')).toBe(true);
    expect(matchesGlob('b1', '[abc]1')).toBe(true);
    expect(matchesGlob('d1', '[!abc]1')).toBe(true);
    expect(matchesGlob('a1', '[!abc]1')).toBe(false);
  });

  it('escapes regex characters', () => {
    expect(globToRegExp('a+b.(x)').test('a+b.(x)')).toBe(true);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
  });
});

describe('cooldown', () => {
  const last = new Date(2025, 0, 1, 12, 0, 0);

  it('is active 10 seconds after a backup with a 5 minute cooldown', () => {
    const now = new Date(last.getTime() + 10_000);
    expect(cooldownActive(last, 5, now)).toBe(true);
    expect(cooldownRemainingMinutes(last, 5, now)).toBeCloseTo(5 - 10 / 60);
  });

  it('has expired after 6 minutes', () => {
    const now = new Date(last.getTime() + 6 * 60_000);
    expect(cooldownActive(last, 5, now)).toBe(false);
    expect(cooldownRemainingMinutes(last, 5, now)).toBe(0);
  });

  it('is never active before the first backup', () => {
    expect(cooldownActive(null, 5)).toBe(false);
  });
});
