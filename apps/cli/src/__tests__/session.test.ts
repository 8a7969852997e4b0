import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PromptDatabase } from '../database';
import { JsonPromptStore } from '../jsonStore';
import { createPromptRecord } from '../record';
import { PromptSession } from '../session';
import { cleanupTempDirs, makeTempDir } from './helpers';

describe('PromptSession', () => {
  let primary: JsonPromptStore;
  let db: PromptDatabase;
  let changes: Array<string | null>;
  let session: PromptSession;

  beforeEach(() => {
    primary = new JsonPromptStore(path.join(makeTempDir(), 'prompts.json'));
    db = new PromptDatabase({ primary });
    changes = [];
    session = new PromptSession(db, id => changes.push(id));
  });

  afterEach(() => {
    cleanupTempDirs();
  });

  it('starts idle and ignores changes while idle', () => {
    expect(session.state).toEqual({ kind: 'idle' });
    expect(session.recordAssociation('/a.ts', 10)).toBe(false);
  });

  it('adds a new record to the database when it becomes active', () => {
    const record = session.setActive(createPromptRecord('do it', 'Claude', '', { id: 'p1' }));
    expect(db.get('p1')).toBe(record);
    expect(session.active?.id).toBe('p1');
    expect(changes).toEqual(['p1']);
  });

  it('adds a path once and overwrites its token change', () => {
    session.setActive(createPromptRecord('do it', 'Claude', '', { id: 'p1' }));
    expect(session.recordAssociation('/a.ts', 10)).toBe(true);
    expect(session.recordAssociation('/a.ts', -4)).toBe(true);

    const [saved] = primary.loadAll();
    expect(saved.associatedFiles).toEqual(['/a.ts']);
    expect(saved.fileChanges).toEqual({ '/a.ts': -4 });
  });

  it('attributes changes only to the prompt that replaced the previous one', () => {
    session.setActive(createPromptRecord('first', 'Claude', '', { id: 'p1' }));
    session.setActive(createPromptRecord('second', 'Claude', '', { id: 'p2' }));
    expect(session.recordAssociation('/f.ts', 10)).toBe(true);

    expect(db.get('p1')?.associatedFiles).toEqual([]);
    expect(db.get('p1')?.fileChanges).toEqual({});
    expect(db.get('p2')?.associatedFiles).toEqual(['/f.ts']);
    expect(db.get('p2')?.fileChanges).toEqual({ '/f.ts': 10 });
    expect(changes).toEqual(['p1', 'p2']);
  });

  it('activates stored prompts by id', () => {
    db.add(createPromptRecord('stored', 'Claude', '', { id: 's1' }));
    expect(session.activate('s1')?.id).toBe('s1');
    expect(session.activate('missing')).toBeNull();
    expect(session.active?.id).toBe('s1');
  });

  it('notifies once when cleared', () => {
    session.setActive(createPromptRecord('x', 'Claude', '', { id: 'p1' }));
    session.clear();
    session.clear();
    expect(changes).toEqual(['p1', null]);
    expect(session.active).toBeNull();
  });

  it('rebinds to the reloaded record', () => {
    session.setActive(createPromptRecord('x', 'Claude', '', { id: 'p1' }));
    db.load();
    session.rebind();
    expect(session.active).toBe(db.get('p1'));
    session.recordAssociation('/b.ts', 3);
    expect(db.get('p1')?.associatedFiles).toEqual(['/b.ts']);
  });

  it('clears itself when the active prompt is deleted', () => {
    session.setActive(createPromptRecord('x', 'Claude', '', { id: 'p1' }));
    expect(session.removePrompt('p1')).toBe(true);
    expect(session.state.kind).toBe('idle');
    expect(changes).toEqual(['p1', null]);
  });
});
