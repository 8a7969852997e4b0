import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonPromptStore } from '../jsonStore';
import { createPromptRecord } from '../record';
import { recordFromStored, RelationalPromptStore } from '../store';
import { cleanupTempDirs, makeTempDir } from './helpers';

describe('RelationalPromptStore', () => {
  let dir: string;
  let capture: JsonPromptStore;
  let store: RelationalPromptStore;

  beforeEach(() => {
    dir = makeTempDir();
    capture = new JsonPromptStore(path.join(dir, 'captured_prompts.json'));
    store = new RelationalPromptStore(path.join(dir, 'prompts.db'), capture);
  });

  afterEach(() => {
    store.close();
    cleanupTempDirs();
  });

  it('inserts a prompt and writes it through to the capture file', () => {
    const id = store.addPrompt({
      promptText: 'Summarise the changelog',
      llmName: 'Claude',
      source: 'proxy',
      modelName: 'claude-3-opus',
      url: 'https://api.anthropic.com/v1/messages',
      metadata: { api_type: 'messages' },
      associatedFiles: ['/CHANGELOG.md'],
    });

    const stored = store.getPrompt(id);
    expect(stored?.source).toBe('proxy');
    expect(stored?.modelName).toBe('claude-3-opus');
    expect(stored?.metadata).toEqual({ api_type: 'messages' });
    expect(stored?.associatedFiles).toEqual(['/CHANGELOG.md']);

    const [written] = capture.loadAll();
    expect(written.id).toBe(id);
    expect(written.description).toBe('Prompt from Claude');
    expect(written.source).toBeUndefined();
    expect(written.rawSource).toBe('proxy');
    const [entry] = JSON.parse(fs.readFileSync(capture.filePath, 'utf-8'));
    expect(entry.source).toBe('proxy');
  });

  it('replaces the token change when a file is associated again', () => {
    const id = store.addPrompt({ promptText: 'x', llmName: 'Claude' });
    expect(store.associateFiles(id, ['/a.ts'], 10)).toBe(true);
    expect(store.associateFiles(id, ['/a.ts'], 70)).toBe(true);
    expect(store.getPrompt(id)?.fileChanges).toEqual({ '/a.ts': 70 });
    expect(capture.loadAll()[0].fileChanges).toEqual({ '/a.ts': 70 });
    expect(store.associateFiles('missing', ['/a.ts'])).toBe(false);
  });

  it('searches by text, llm, source and file', () => {
    const a = store.addPrompt({ promptText: 'refactor auth', llmName: 'Claude', source: 'proxy', associatedFiles: ['/src/auth.ts'] });
    const b = store.addPrompt({ promptText: 'write tests', llmName: 'ChatGPT', source: 'Web Browser' });

    expect(store.searchPrompts({ text: 'auth' }).map(row => row.id)).toEqual([a]);
    expect(store.searchPrompts({ llmName: 'ChatGPT' }).map(row => row.id)).toEqual([b]);
    expect(store.searchPrompts({ source: 'proxy' }).map(row => row.id)).toEqual([a]);
    expect(store.searchPrompts({ filePath: 'auth.ts' }).map(row => row.id)).toEqual([a]);
    expect(store.searchPrompts({ startDate: '2999-01-01' })).toEqual([]);
    expect(store.countPrompts()).toBe(2);
  });

  it('imports a JSON file idempotently', () => {
    const source = new JsonPromptStore(path.join(dir, 'prompts.json'));
    source.append(createPromptRecord('one', 'Claude', '', { id: 'j1' }));
    source.append(createPromptRecord('two', 'Claude', '', { id: 'j2' }));

    expect(store.importFromJson(source.filePath)).toBe(2);
    expect(store.importFromJson(source.filePath)).toBe(0);
    expect(store.getPrompt('j1')?.source).toBe('json_import');
    expect(store.importFromJson(path.join(dir, 'missing.json'))).toBe(0);
  });

  it('exports only rows missing from the target file', () => {
    store.append(createPromptRecord('kept', 'Claude', '', { id: 'r1' }));
    const target = path.join(dir, 'export.json');
    expect(store.exportToJson(target)).toBe(1);
    expect(store.exportToJson(target)).toBe(0);
    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toHaveLength(1);
  });

  it('deletes a prompt with its associations', () => {
    const id = store.addPrompt({ promptText: 'x', llmName: 'Claude', associatedFiles: ['/a.ts'] });
    expect(store.remove(id)).toBe(true);
    expect(store.hasPrompt(id)).toBe(false);
    expect(store.searchPrompts({ filePath: '/a.ts' })).toEqual([]);
    expect(capture.loadAll()).toEqual([]);
    expect(store.remove(id)).toBe(false);
  });

  it('pages newest first', () => {
    store.append(createPromptRecord('old', 'x', '', { id: 'old', timestamp: new Date(2024, 0, 1) }));
    store.append(createPromptRecord('new', 'x', '', { id: 'new', timestamp: new Date(2025, 0, 1) }));
    expect(store.getPrompts(1).map(row => row.id)).toEqual(['new']);
    expect(store.getPrompts(1, 1).map(row => row.id)).toEqual(['old']);
  });
});

describe('recordFromStored', () => {
  it('keeps non-label sources out of the label and keeps token changes', () => {
    const record = recordFromStored({
      id: 's1',
      timestamp: '2025-05-09T23:15:44.000000',
      source: 'proxy',
      llmName: 'Claude',
      modelName: null,
      promptText: 'x',
      description: null,
      url: null,
      conversationId: null,
      metadata: null,
      associatedFiles: ['/a.ts'],
      fileChanges: { '/a.ts': 12 },
    });
    expect(record.source).toBeUndefined();
    expect(record.rawSource).toBe('proxy');
    expect(record.description).toBe('');
    expect(record.fileChanges).toEqual({ '/a.ts': 12 });
    expect(record.timestamp.getTime()).toBe(new Date(2025, 4, 9, 23, 15, 44).getTime());
  });
});
