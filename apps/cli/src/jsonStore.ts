import * as fs from 'fs';
import * as path from 'path';
import type { PromptRecord, PromptStore, WriteResult } from '@promptlink/types';
import { describeError, createLogger } from './log';
import { parsePromptRecords, recordToEntry } from './record';

const log = createLogger('json');

const entryId = (entry: unknown): string | null => {
  if (typeof entry === 'object' && entry !== null && 'id' in entry && typeof entry.id === 'string') {
    return entry.id;
  }
  return null;
};

/**
 * Prompt records kept as one JSON array. Other processes rewrite the same
 * file, so every write loads the current array, applies the change and
 * persists the whole set. There is no cross-process lock: two writers that
 * interleave between read and rename still lose one write.
 */
export class JsonPromptStore implements PromptStore {
  constructor(readonly filePath: string) {}

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Raw array from disk. Missing, corrupt or non-array files read as empty.
   */
  readRaw(): unknown[] {
    if (!this.exists()) {
      return [];
    }
    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      if (!content.trim()) {
        return [];
      }
      const parsed: unknown = JSON.parse(content);
      if (!Array.isArray(parsed)) {
        log.warn(`${this.filePath} does not contain a JSON array, treating it as empty`);
        return [];
      }
      return parsed;
    } catch (error) {
      log.warn(`Failed to read ${this.filePath}, treating it as empty`, error);
      return [];
    }
  }

  loadAll(): PromptRecord[] {
    return parsePromptRecords(this.readRaw(), this.filePath);
  }

  /**
   * Entry count and mtime, used to notice writes from other processes
   */
  stat(): { mtimeMs: number; count: number } | null {
    try {
      const stats = fs.statSync(this.filePath);
      return { mtimeMs: stats.mtimeMs, count: this.readRaw().length };
    } catch {
      return null;
    }
  }

  /**
   * Persist the full collection. Entries on disk whose ids the caller does
   * not know, and did not remove, are kept so appends from other processes
   * survive. Writes go to a temp file that is renamed into place.
   */
  saveAll(records: PromptRecord[], removedIds: Iterable<string> = []): WriteResult {
    const known = new Set(records.map(record => record.id));
    const removed = new Set(removedIds);
    const foreign = this.readRaw().filter(entry => {
      const id = entryId(entry);
      return id === null || (!known.has(id) && !removed.has(id));
    });
    if (foreign.length > 0) {
      log.debug(`Keeping ${foreign.length} entries written by other processes`);
    }

    const entries: unknown[] = [...records.map(recordToEntry), ...foreign];
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(entries, null, 2), 'utf-8');
      fs.renameSync(tempPath, this.filePath);
      return { ok: true };
    } catch (error) {
      log.error(`Failed to write ${this.filePath}`, error);
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      return { ok: false, error: `Could not write ${this.filePath}: ${describeError(error)}` };
    }
  }

  /**
   * Append a record unless its id is already stored. Throws when the file
   * cannot be written.
   */
  append(record: PromptRecord): string {
    const records = this.loadAll();
    if (records.some(existing => existing.id === record.id)) {
      log.debug(`Prompt ${record.id} already in ${this.filePath}`);
      return record.id;
    }
    records.push(record);
    const result = this.saveAll(records);
    if (!result.ok) {
      throw new Error(result.error);
    }
    return record.id;
  }

  updateAssociations(id: string, files: string[], tokenChange: number): boolean {
    const records = this.loadAll();
    const record = records.find(existing => existing.id === id);
    if (!record) {
      return false;
    }
    for (const file of files) {
      if (!record.associatedFiles.includes(file)) {
        record.associatedFiles.push(file);
      }
      record.fileChanges[file] = tokenChange;
    }
    return this.saveAll(records).ok;
  }

  remove(id: string): boolean {
    const records = this.loadAll();
    const remaining = records.filter(record => record.id !== id);
    if (remaining.length === records.length) {
      return false;
    }
    return this.saveAll(remaining, [id]).ok;
  }
}
