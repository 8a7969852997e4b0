import type { PromptRecord } from './PromptRecord';

/**
 * A backend that holds prompt records. Both the JSON file and the SQLite
 * database implement it so the database layer can merge them uniformly.
 */
export interface PromptStore {
  append(record: PromptRecord): string;
  loadAll(): PromptRecord[];
  updateAssociations(id: string, files: string[], tokenChange: number): boolean;
  /** False when the id was not stored */
  remove(id: string): boolean;
}

/**
 * A row of the prompts table, with its file associations joined in
 */
export interface StoredPrompt {
  id: string;
  timestamp: string;
  source: string;
  llmName: string;
  modelName: string | null;
  promptText: string;
  description: string | null;
  url: string | null;
  conversationId: string | null;
  metadata: Record<string, unknown> | null;
  associatedFiles: string[];
  fileChanges: Record<string, number>;
}

export interface NewPromptInput {
  promptText: string;
  llmName: string;
  source?: string;
  modelName?: string | null;
  description?: string | null;
  url?: string | null;
  conversationId?: string | null;
  metadata?: Record<string, unknown> | null;
  associatedFiles?: string[];
}

export interface PromptSearchFilters {
  text?: string;
  llmName?: string;
  source?: string;
  filePath?: string;
  startDate?: string; // ISO timestamp
  endDate?: string; // ISO timestamp
  limit?: number;
}

/**
 * Outcome of a write that can fail on I/O without aborting the caller
 */
export type WriteResult = { ok: true } | { ok: false; error: string };
