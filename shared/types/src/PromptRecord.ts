/**
 * Where a prompt was captured. Records written before the field existed
 * have no source and get one inferred from their description and model.
 */
export type PromptSource = 'Claude Desktop' | 'Web Browser' | 'Unknown';

/**
 * A manual, after-the-fact association of files with a prompt
 */
export interface RetroactiveNote {
  files: string[];
  tokenChange: number;
  notes: string;
}

export interface PromptRecord {
  id: string;
  timestamp: Date;
  promptText: string;
  llmUsed: string;
  description: string;
  source?: PromptSource;
  /** A capture channel's own source value, such as "proxy"; written back verbatim */
  rawSource?: string;
  associatedFiles: string[];
  /**
   * Signed token-count delta per file, recorded when the file was associated.
   * A manual link can exist in associatedFiles without an entry here.
   */
  fileChanges: Record<string, number>;
  retroactiveNotes: Record<string, RetroactiveNote>; // keyed by note timestamp
  metadata?: Record<string, unknown>;
}

/**
 * The JSON shape shared by every capture channel. Other processes write this
 * file too, so unknown keys are tolerated and every field but id and
 * prompt_text is optional on read.
 */
export interface PromptEntry {
  id: string;
  timestamp: string;
  prompt_text: string;
  description: string;
  model: string;
  files: string[];
  source?: string;
  file_changes?: Record<string, number>;
  retroactive_notes?: Record<string, { files: string[]; token_change: number; notes: string }>;
  metadata?: Record<string, unknown>;
}
