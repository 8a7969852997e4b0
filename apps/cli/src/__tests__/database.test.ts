import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { PromptRecord } from '@promptlink/types';
import { PromptDatabase, resolveRetroTokenChange } from '../database';
import { JsonPromptStore } from '../jsonStore';
import { createPromptRecord } from '../record';
import { reconcile } from '../reconcile';
import { RelationalPromptStore } from '../store';
import { cleanupTempDirs, makeTempDir } from './helpers';

const prompt = (id: string, text: string = id, extra: Partial<PromptRecord> = {}): PromptRecord => ({
  ...createPromptRecord(text, 'Claude', `about ${text}`, { id, timestamp: new Date(2025, 0, 1, 12) }),
  ...extra,
});

describe('reconcile', () => {
  it('keeps the first record seen for an id', () => {
    const merged = reconcile([prompt('a', 'primary')], [prompt('a', 'capture'), prompt('b')]);
    expect(merged.map(record => [record.id, record.promptText])).toEqual([
      ['a', 'primary'],
      ['b', 'b'],
    ]);
  });

  it('preserves merge order rather than timestamp order', () => {
    const late = prompt('late', 'late', { timestamp: new Date(2025, 5, 1) });
    const early = prompt('early', 'early', { timestamp: new Date(2024, 0, 1) });
    expect(reconcile([late], [early]).map(record => record.id)).toEqual(['late', 'early']);
  });
});

describe('PromptDatabase', () => {
  let dir: string;
  let primary: JsonPromptStore;
  let capture: JsonPromptStore;

  beforeEach(() => {
    dir = makeTempDir();
    primary = new JsonPromptStore(path.join(dir, 'prompts.json'));
    capture = new JsonPromptStore(path.join(dir, 'captured_prompts.json'));
  });

  afterEach(() => {
    cleanupTempDirs();
  });

  it('lets the primary file win over the capture file for the same id', () => {
    primary.append(prompt('shared', 'from primary'));
    capture.append(prompt('shared', 'from capture'));
    capture.append(prompt('captured-only'));

    const db = new PromptDatabase({ primary, capture });
    db.load();
    expect(db.get('shared')?.promptText).toBe('from primary');
    expect(db.size).toBe(2);
  });

  it('imports the same capture file twice without duplicates', () => {
    capture.append(prompt('c1'));
    const db = new PromptDatabase({ primary, capture });
    db.load();
    db.save();
    db.load();
    db.save();
    expect(db.size).toBe(1);
    expect(primary.loadAll().map(record => record.id)).toEqual(['c1']);
  });

  it('merges relational rows last', () => {
    const relational = new RelationalPromptStore(path.join(dir, 'prompts.db'));
    try {
      relational.append(prompt('r1', 'from sqlite'));
      primary.append(prompt('p1'));
      const db = new PromptDatabase({ primary, capture, relational });
      expect(db.load().map(record => record.id)).toEqual(['p1', 'r1']);
    } finally {
      relational.close();
    }
  });

  it('adds a record once', () => {
    const db = new PromptDatabase({ primary });
    const first = db.add(prompt('a'));
    const second = db.add(prompt('a', 'other text'));
    expect(second).toBe(first);
    expect(db.size).toBe(1);
  });

  it('removes a prompt from every backend so it stays gone after reload', () => {
    capture.append(prompt('gone'));
    const db = new PromptDatabase({ primary, capture });
    db.load();
    db.save();

    expect(db.remove('gone')).toBe(true);
    expect(db.remove('gone')).toBe(false);
    db.load();
    expect(db.get('gone')).toBeUndefined();
    expect(capture.loadAll()).toEqual([]);
  });

  it('filters recent prompts by hours', () => {
    const now = new Date(2025, 0, 2, 12);
    const db = new PromptDatabase({ primary });
    db.add(prompt('fresh', 'fresh', { timestamp: new Date(2025, 0, 2, 1) }));
    db.add(prompt('stale', 'stale', { timestamp: new Date(2024, 11, 30) }));
    expect(db.getRecent(24, now).map(record => record.id)).toEqual(['fresh']);
  });

  it('searches text, description and LLM case-insensitively', () => {
    const db = new PromptDatabase({ primary });
    db.add(prompt('a', 'Fix the LOGIN form'));
    db.add(prompt('b', 'write docs', { llmUsed: 'Gemini' }));
    expect(db.search('login').map(record => record.id)).toEqual(['a']);
    expect(db.search('gemini').map(record => record.id)).toEqual(['b']);
    expect(db.search('about write').map(record => record.id)).toEqual(['b']);
  });

  it('associates files manually without duplicating them', () => {
    const db = new PromptDatabase({ primary });
    db.add(prompt('a'));
    expect(db.associateFiles('a', ['/x.ts', '/y.ts'], 40)).toBe(2);
    expect(db.associateFiles('a', ['/x.ts'], 99)).toBe(0);
    expect(db.get('a')?.fileChanges).toEqual({ '/x.ts': 40, '/y.ts': 40 });
    expect(db.associateFiles('missing', ['/x.ts'])).toBeNull();
  });

  it('records retroactive associations with the preset estimate and a note', () => {
    const db = new PromptDatabase({ primary });
    db.add(prompt('a'));
    const now = new Date(2025, 4, 9, 23, 15, 44);

    const result = db.addRetroactiveAssociation('a', ['/x.ts'], 'Major', 'done later', now);
    expect(result).toEqual({ newlyAdded: 1, tokenChange: 300, noteKey: '2025-05-09 23:15:44' });
    const record = db.get('a');
    expect(record?.fileChanges).toEqual({ '/x.ts': 300 });
    expect(record?.retroactiveNotes['2025-05-09 23:15:44']).toEqual({
      files: ['/x.ts'],
      tokenChange: 300,
      notes: 'done later',
    });
    expect(db.getPromptsForFile('/x.ts').map(found => found.id)).toEqual(['a']);
  });

  it('skips the note when none is given and leaves existing files alone', () => {
    const db = new PromptDatabase({ primary });
    db.add(prompt('a'));
    db.associateFiles('a', ['/x.ts'], 5);
    expect(db.addRetroactiveAssociation('a', ['/x.ts'], 'Auto')).toEqual({ newlyAdded: 0, tokenChange: 100, noteKey: null });
    expect(db.get('a')?.fileChanges['/x.ts']).toBe(5);
    expect(db.addRetroactiveAssociation('missing', ['/x.ts'], 'Auto')).toBeNull();
  });

  it('resolves token presets and custom values', () => {
    expect(resolveRetroTokenChange('Minor')).toBe(25);
    expect(resolveRetroTokenChange('Moderate')).toBe(100);
    expect(resolveRetroTokenChange(42)).toBe(42);
  });
});
