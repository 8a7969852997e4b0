import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { JournalNote, WriteResult } from '@promptlink/types';
import { createLogger, describeError } from './log';
import { formatNoteTimestamp } from './record';

const log = createLogger('notes');

export const DEFAULT_PROJECT = 'Origin';

const JournalNoteSchema = z.object({
  timestamp: z.string(),
  project: z.string().catch(DEFAULT_PROJECT),
  note: z.string(),
});

/**
 * Append-only progress journal kept in notes.json
 */
export class NotesJournal {
  constructor(readonly filePath: string) {}

  loadNotes(): JournalNote[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      if (!Array.isArray(parsed)) {
        log.warn(`${this.filePath} is not a list of notes, ignoring it`);
        return [];
      }
      const notes: JournalNote[] = [];
      for (const item of parsed) {
        const result = JournalNoteSchema.safeParse(item);
        if (result.success) {
          notes.push(result.data);
        } else {
          log.warn('Skipping malformed note');
        }
      }
      return notes;
    } catch (error) {
      log.warn(`Could not read ${this.filePath}`, error);
      return [];
    }
  }

  saveNote(text: string, project: string = DEFAULT_PROJECT, now: Date = new Date()): WriteResult {
    const notes = this.loadNotes();
    notes.push({ timestamp: formatNoteTimestamp(now), project, note: text });
    return this.write(notes);
  }

  /**
   * Remove the note at index. Out-of-range indexes are nothing to do and
   * return null.
   */
  deleteNote(index: number): JournalNote | null {
    const notes = this.loadNotes();
    if (!Number.isInteger(index) || index < 0 || index >= notes.length) {
      return null;
    }
    const [deleted] = notes.splice(index, 1);
    const result = this.write(notes);
    if (!result.ok) {
      throw new Error(result.error);
    }
    return deleted;
  }

  private write(notes: JournalNote[]): WriteResult {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(notes, null, 2), 'utf-8');
      return { ok: true };
    } catch (error) {
      log.error(`Failed to write ${this.filePath}`, error);
      return { ok: false, error: `Could not write ${this.filePath}: ${describeError(error)}` };
    }
  }
}

export function formatRetroactiveNote(
  description: string,
  date: string,
  files: string[],
  userNotes: string
): string {
  return [
    'Retroactive Prompt Association',
    '',
    `Prompt: ${description || 'Untitled'}`,
    `Date: ${date}`,
    `Files associated: ${files.length}`,
    '',
    'User Notes:',
    userNotes,
    '',
    'Files:',
    ...files.map(file => `- ${file}`),
  ].join('\n');
}

export function formatRollbackNote(snapshotPath: string, selected: string[], failed: string[]): string {
  const lines = [
    'Rollback Operation Summary',
    '',
    `Backup file: ${snapshotPath}`,
    `Files selected for restore: ${selected.length}`,
    `Successfully restored: ${selected.length - failed.length}`,
    `Failed to restore: ${failed.length}`,
    '',
    'Restored files:',
    ...selected.filter(file => !failed.includes(file)).map(file => `- ${file}`),
  ];
  if (failed.length > 0) {
    lines.push('', 'Failed files:', ...failed.map(file => `- ${file}`));
  }
  return lines.join('\n');
}
