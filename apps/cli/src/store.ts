import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type {
  NewPromptInput,
  PromptRecord,
  PromptSearchFilters,
  PromptStore,
  StoredPrompt,
} from '@promptlink/types';
import { v4 as uuidv4 } from 'uuid';
import { JsonPromptStore } from './jsonStore';
import { createLogger } from './log';
import { createPromptRecord, formatTimestamp, parseTimestamp } from './record';

const log = createLogger('store');

interface PromptRow {
  id: string;
  timestamp: string;
  source: string | null;
  llm_name: string;
  model_name: string | null;
  prompt_text: string;
  description: string | null;
  url: string | null;
  conversation_id: string | null;
  metadata: string | null;
}

interface AssociationRow {
  file_path: string;
  token_change: number | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseMetadata = (raw: string | null): Record<string, unknown> | null => {
  if (!raw) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch (error) {
    log.warn('Ignoring unreadable prompt metadata', error);
    return null;
  }
};

/**
 * SQLite store used by the proxy and server channels. Every insert is also
 * written through to the JSON capture file, which stays the format all
 * channels can read. The two writes are not atomic together.
 */
export class RelationalPromptStore implements PromptStore {
  private readonly db: Database.Database;

  constructor(readonly dbPath: string, private readonly jsonStore: JsonPromptStore | null = null) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('foreign_keys = ON');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS prompts (
        id TEXT PRIMARY KEY,
        timestamp TEXT NOT NULL,
        source TEXT NOT NULL,
        llm_name TEXT NOT NULL,
        model_name TEXT,
        prompt_text TEXT NOT NULL,
        description TEXT,
        url TEXT,
        conversation_id TEXT,
        metadata TEXT
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS file_associations (
        prompt_id TEXT NOT NULL,
        file_path TEXT NOT NULL,
        token_change INTEGER DEFAULT 0,
        PRIMARY KEY (prompt_id, file_path),
        FOREIGN KEY (prompt_id) REFERENCES prompts(id) ON DELETE CASCADE
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_prompts_timestamp ON prompts(timestamp DESC)
    `);
  }

  close(): void {
    this.db.close();
  }

  /**
   * Insert a new prompt with its file associations, then write it through to
   * the JSON capture file. Returns the new id.
   */
  addPrompt(input: NewPromptInput): string {
    const id = uuidv4();
    const now = new Date();
    const source = input.source ?? 'unknown';
    const files = input.associatedFiles ?? [];

    const insertPrompt = this.db.prepare(`
      INSERT INTO prompts (
        id, timestamp, source, llm_name, model_name, prompt_text,
        description, url, conversation_id, metadata
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertAssociation = this.db.prepare(`
      INSERT OR IGNORE INTO file_associations (prompt_id, file_path) VALUES (?, ?)
    `);

    this.db.transaction(() => {
      insertPrompt.run(
        id,
        formatTimestamp(now),
        source,
        input.llmName,
        input.modelName ?? null,
        input.promptText,
        input.description ?? null,
        input.url ?? null,
        input.conversationId ?? null,
        input.metadata ? JSON.stringify(input.metadata) : null
      );
      for (const file of files) {
        insertAssociation.run(id, file);
      }
    })();

    this.writeThrough(
      createPromptRecord(input.promptText, input.llmName, input.description || `Prompt from ${input.llmName}`, {
        id,
        timestamp: now,
        files,
        source,
      })
    );

    return id;
  }

  /**
   * Store an existing canonical record, keeping its id. Already-present ids
   * are left alone.
   */
  append(record: PromptRecord): string {
    if (this.hasPrompt(record.id)) {
      return record.id;
    }
    this.insertRecord(record, record.source ?? record.rawSource ?? 'Unknown');
    this.writeThrough(record);
    return record.id;
  }

  loadAll(): PromptRecord[] {
    const rows = this.db.prepare<[], PromptRow>('SELECT * FROM prompts ORDER BY timestamp ASC').all();
    return rows.map(row => recordFromStored(this.toStoredPrompt(row)));
  }

  updateAssociations(id: string, files: string[], tokenChange: number): boolean {
    return this.associateFiles(id, files, tokenChange);
  }

  /**
   * Associate files with a prompt. Re-associating a file replaces its token
   * change. Returns false for an unknown prompt.
   */
  associateFiles(promptId: string, filePaths: string[], tokenChange: number = 0): boolean {
    if (!this.hasPrompt(promptId)) {
      return false;
    }

    const upsert = this.db.prepare(`
      INSERT OR REPLACE INTO file_associations (prompt_id, file_path, token_change) VALUES (?, ?, ?)
    `);
    this.db.transaction(() => {
      for (const filePath of filePaths) {
        upsert.run(promptId, filePath, tokenChange);
      }
    })();

    if (this.jsonStore && !this.jsonStore.updateAssociations(promptId, filePaths, tokenChange)) {
      log.warn(`Prompt ${promptId} not updated in ${this.jsonStore.filePath}`);
    }
    return true;
  }

  remove(id: string): boolean {
    const result = this.db.prepare('DELETE FROM prompts WHERE id = ?').run(id);
    if (result.changes > 0 && this.jsonStore) {
      this.jsonStore.remove(id);
    }
    return result.changes > 0;
  }

  hasPrompt(id: string): boolean {
    return this.db.prepare<[string], { id: string }>('SELECT id FROM prompts WHERE id = ?').get(id) !== undefined;
  }

  getPrompt(id: string): StoredPrompt | null {
    const row = this.db.prepare<[string], PromptRow>('SELECT * FROM prompts WHERE id = ?').get(id);
    return row ? this.toStoredPrompt(row) : null;
  }

  /**
   * Newest first
   */
  getPrompts(limit: number = 100, offset: number = 0): StoredPrompt[] {
    const rows = this.db
      .prepare<[number, number], PromptRow>('SELECT * FROM prompts ORDER BY timestamp DESC LIMIT ? OFFSET ?')
      .all(limit, offset);
    return rows.map(row => this.toStoredPrompt(row));
  }

  searchPrompts(filters: PromptSearchFilters): StoredPrompt[] {
    let query = 'SELECT DISTINCT p.* FROM prompts p';
    const where: string[] = [];
    const params: Array<string | number> = [];

    if (filters.filePath) {
      query += ' JOIN file_associations fa ON p.id = fa.prompt_id';
      where.push('fa.file_path LIKE ?');
      params.push(`%${filters.filePath}%`);
    }
    if (filters.text) {
      where.push('(p.prompt_text LIKE ? OR p.description LIKE ?)');
      params.push(`%${filters.text}%`, `%${filters.text}%`);
    }
    if (filters.llmName) {
      where.push('p.llm_name = ?');
      params.push(filters.llmName);
    }
    if (filters.source) {
      where.push('p.source = ?');
      params.push(filters.source);
    }
    if (filters.startDate) {
      where.push('p.timestamp >= ?');
      params.push(filters.startDate);
    }
    if (filters.endDate) {
      where.push('p.timestamp <= ?');
      params.push(filters.endDate);
    }

    if (where.length > 0) {
      query += ` WHERE ${where.join(' AND ')}`;
    }
    query += ' ORDER BY p.timestamp DESC LIMIT ?';
    params.push(filters.limit ?? 100);

    const rows = this.db.prepare<Array<string | number>, PromptRow>(query).all(...params);
    return rows.map(row => this.toStoredPrompt(row));
  }

  countPrompts(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM prompts').get();
    return row ? row.count : 0;
  }

  /**
   * Copy prompts from a JSON prompts file. Ids already present are skipped,
   * so repeated imports are idempotent. Returns the number imported.
   */
  importFromJson(jsonPath: string): number {
    const source = new JsonPromptStore(jsonPath);
    if (!source.exists()) {
      return 0;
    }

    let imported = 0;
    this.db.transaction(() => {
      for (const record of source.loadAll()) {
        if (this.hasPrompt(record.id)) {
          continue;
        }
        this.insertRecord(record, 'json_import');
        imported += 1;
      }
    })();
    log.info(`Imported ${imported} prompt(s) from ${jsonPath}`);
    return imported;
  }

  /**
   * Append every stored prompt missing from a JSON prompts file. Returns the
   * number written.
   */
  exportToJson(jsonPath: string): number {
    const target = new JsonPromptStore(jsonPath);
    const records = target.loadAll();
    const present = new Set(records.map(record => record.id));
    const missing = this.loadAll().filter(record => !present.has(record.id));
    if (missing.length === 0) {
      return 0;
    }

    const result = target.saveAll([...records, ...missing]);
    if (!result.ok) {
      throw new Error(result.error);
    }
    return missing.length;
  }

  private insertRecord(record: PromptRecord, source: string): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO prompts (id, timestamp, source, llm_name, prompt_text, description, metadata)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.id,
        formatTimestamp(record.timestamp),
        source,
        record.llmUsed,
        record.promptText,
        record.description,
        record.metadata ? JSON.stringify(record.metadata) : null
      );

    const insertAssociation = this.db.prepare(
      'INSERT OR IGNORE INTO file_associations (prompt_id, file_path, token_change) VALUES (?, ?, ?)'
    );
    for (const file of record.associatedFiles) {
      insertAssociation.run(record.id, file, record.fileChanges[file] ?? 0);
    }
  }

  private writeThrough(record: PromptRecord): void {
    if (!this.jsonStore) {
      return;
    }
    try {
      this.jsonStore.append(record);
    } catch (error) {
      log.error(`Prompt ${record.id} saved to the database but not to ${this.jsonStore.filePath}`, error);
    }
  }

  private toStoredPrompt(row: PromptRow): StoredPrompt {
    const associations = this.db
      .prepare<[string], AssociationRow>('SELECT file_path, token_change FROM file_associations WHERE prompt_id = ?')
      .all(row.id);

    const fileChanges: Record<string, number> = {};
    for (const association of associations) {
      fileChanges[association.file_path] = association.token_change ?? 0;
    }

    return {
      id: row.id,
      timestamp: row.timestamp,
      source: row.source ?? 'unknown',
      llmName: row.llm_name,
      modelName: row.model_name,
      promptText: row.prompt_text,
      description: row.description,
      url: row.url,
      conversationId: row.conversation_id,
      metadata: parseMetadata(row.metadata),
      associatedFiles: associations.map(association => association.file_path),
      fileChanges,
    };
  }
}

/**
 * Project a relational row into the canonical record. Non-label sources
 * such as "proxy" become rawSource and the label gets inferred.
 */
export function recordFromStored(stored: StoredPrompt): PromptRecord {
  const record = createPromptRecord(stored.promptText, stored.llmName || 'Unknown', stored.description ?? '', {
    id: stored.id,
    timestamp: parseTimestamp(stored.timestamp),
    files: stored.associatedFiles,
    source: stored.source,
    metadata: stored.metadata ?? undefined,
  });
  record.fileChanges = { ...stored.fileChanges };
  return record;
}
