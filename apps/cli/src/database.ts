import type { PromptRecord, PromptStore, WriteResult } from '@promptlink/types';
import { JsonPromptStore } from './jsonStore';
import { createLogger } from './log';
import { formatNoteTimestamp } from './record';
import { reconcile } from './reconcile';

const log = createLogger('database');

/**
 * Token change presets for associations made after the fact. "Auto" is a
 * fixed estimate; nothing measures the actual change.
 */
export const RETRO_TOKEN_PRESETS = {
  Auto: 100,
  Minor: 25,
  Moderate: 100,
  Major: 300,
} as const;

export type RetroTokenPreset = keyof typeof RETRO_TOKEN_PRESETS;
export type RetroTokenOption = RetroTokenPreset | number;

export function isRetroTokenPreset(value: string): value is RetroTokenPreset {
  return Object.prototype.hasOwnProperty.call(RETRO_TOKEN_PRESETS, value);
}

export function resolveRetroTokenChange(option: RetroTokenOption): number {
  return typeof option === 'number' ? option : RETRO_TOKEN_PRESETS[option];
}

export interface RetroactiveResult {
  newlyAdded: number;
  tokenChange: number;
  /** Key of the note recorded on the prompt, when notes were given */
  noteKey: string | null;
}

export interface PromptDatabaseOptions {
  primary: JsonPromptStore;
  /** JSON file written by other capture channels */
  capture?: JsonPromptStore | null;
  relational?: PromptStore | null;
}

/**
 * The canonical prompt collection. It is rebuilt from every backend on
 * load() and written back to the primary JSON file on every change.
 */
export class PromptDatabase {
  private records: PromptRecord[] = [];
  private readonly removedIds = new Set<string>();
  private readonly primary: JsonPromptStore;
  private readonly capture: JsonPromptStore | null;
  private readonly relational: PromptStore | null;

  constructor(options: PromptDatabaseOptions) {
    this.primary = options.primary;
    this.capture = options.capture ?? null;
    this.relational = options.relational ?? null;
  }

  get prompts(): readonly PromptRecord[] {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Primary file first, then the capture file, then the relational store.
   * The first record seen for an id wins.
   */
  load(): PromptRecord[] {
    const primary = this.primary.loadAll();
    const capture = this.capture ? this.capture.loadAll() : [];
    let relational: PromptRecord[] = [];
    if (this.relational) {
      try {
        relational = this.relational.loadAll();
      } catch (error) {
        log.warn('Could not read the relational store, continuing without it', error);
      }
    }

    this.records = reconcile(primary, capture, relational).filter(record => !this.removedIds.has(record.id));
    log.debug(
      `Loaded ${this.records.length} prompts (${primary.length} primary, ${capture.length} captured, ${relational.length} relational)`
    );
    return this.records;
  }

  save(): WriteResult {
    return this.primary.saveAll(this.records, this.removedIds);
  }

  /**
   * Append a record and save. A record whose id is already present is not
   * added twice.
   */
  add(record: PromptRecord): PromptRecord {
    const existing = this.get(record.id);
    if (existing) {
      return existing;
    }
    this.records.push(record);
    this.removedIds.delete(record.id);
    this.saveOrWarn();
    return record;
  }

  get(id: string): PromptRecord | undefined {
    return this.records.find(record => record.id === id);
  }

  /**
   * Delete a prompt from the collection and from every backend. Returns
   * false when there was nothing to delete.
   */
  remove(id: string): boolean {
    const index = this.records.findIndex(record => record.id === id);
    if (index === -1) {
      log.debug(`Prompt ${id} not found, nothing to delete`);
      return false;
    }
    this.records.splice(index, 1);
    this.removedIds.add(id);
    this.saveOrWarn();

    if (this.capture) {
      this.capture.remove(id);
    }
    if (this.relational) {
      try {
        this.relational.remove(id);
      } catch (error) {
        log.warn(`Could not delete prompt ${id} from the relational store`, error);
      }
    }
    return true;
  }

  getRecent(hours: number = 24, now: Date = new Date()): PromptRecord[] {
    const cutoff = now.getTime() - hours * 60 * 60 * 1000;
    return this.records.filter(record => record.timestamp.getTime() >= cutoff);
  }

  /**
   * Prompts linked to the file, live or after the fact
   */
  getPromptsForFile(filePath: string): PromptRecord[] {
    return this.records.filter(
      record =>
        record.associatedFiles.includes(filePath) ||
        Object.values(record.retroactiveNotes).some(note => note.files.includes(filePath))
    );
  }

  /**
   * Case-insensitive match on prompt text, description and LLM
   */
  search(text: string): PromptRecord[] {
    const needle = text.toLowerCase();
    return this.records.filter(
      record =>
        record.promptText.toLowerCase().includes(needle) ||
        record.description.toLowerCase().includes(needle) ||
        record.llmUsed.toLowerCase().includes(needle)
    );
  }

  /**
   * Manual link. Files already associated are left as they are. A token
   * change, when given, is recorded for the new files only. Returns the
   * number of new files, or null for an unknown prompt.
   */
  associateFiles(id: string, files: string[], tokenChange?: number): number | null {
    const record = this.get(id);
    if (!record) {
      return null;
    }

    let added = 0;
    for (const file of files) {
      if (record.associatedFiles.includes(file)) {
        continue;
      }
      record.associatedFiles.push(file);
      if (tokenChange !== undefined) {
        record.fileChanges[file] = tokenChange;
      }
      added += 1;
    }

    if (added > 0) {
      this.saveOrWarn();
    }
    return added;
  }

  /**
   * Associate files with a prompt after the fact, with an estimated token
   * change. Notes, when given, are kept on the prompt keyed by time.
   */
  addRetroactiveAssociation(
    id: string,
    files: string[],
    tokenOption: RetroTokenOption,
    notes: string = '',
    now: Date = new Date()
  ): RetroactiveResult | null {
    const record = this.get(id);
    if (!record) {
      return null;
    }

    const tokenChange = resolveRetroTokenChange(tokenOption);
    let newlyAdded = 0;
    for (const file of files) {
      if (!record.associatedFiles.includes(file)) {
        record.associatedFiles.push(file);
        record.fileChanges[file] = tokenChange;
        newlyAdded += 1;
      }
    }

    let noteKey: string | null = null;
    if (notes.trim()) {
      noteKey = formatNoteTimestamp(now);
      record.retroactiveNotes[noteKey] = { files: [...files], tokenChange, notes };
    }

    this.saveOrWarn();
    return { newlyAdded, tokenChange, noteKey };
  }

  /**
   * Write-through save used by every mutation. Failures are logged; the
   * in-memory change stays.
   */
  saveOrWarn(): boolean {
    const result = this.save();
    if (!result.ok) {
      log.warn(result.error);
    }
    return result.ok;
  }
}
