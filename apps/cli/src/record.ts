import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { PromptEntry, PromptRecord, PromptSource, RetroactiveNote } from '@promptlink/types';
import { createLogger } from './log';

const log = createLogger('record');

export const PROMPT_SOURCES: readonly PromptSource[] = ['Claude Desktop', 'Web Browser', 'Unknown'];

export function isPromptSource(value: unknown): value is PromptSource {
  return typeof value === 'string' && PROMPT_SOURCES.some(source => source === value);
}

/**
 * Schema for one entry of a prompts JSON file. Entries come from several
 * independently written channels, so only id and prompt_text are required and
 * malformed optional fields degrade to their defaults instead of failing.
 */
const RetroactiveNoteSchema = z.object({
  files: z.array(z.string()).catch([]),
  token_change: z.number().catch(0),
  notes: z.string().catch(''),
});

const PromptEntrySchema = z
  .object({
    id: z.string().min(1),
    prompt_text: z.string(),
    timestamp: z.string().nullish().catch(undefined),
    description: z.string().nullish().catch(undefined),
    model: z.string().nullish().catch(undefined),
    llm_used: z.string().nullish().catch(undefined),
    files: z.unknown().optional(),
    associated_files: z.unknown().optional(),
    source: z.string().nullish().catch(undefined),
    file_changes: z.record(z.number()).optional().catch(undefined),
    retroactive_notes: z.record(RetroactiveNoteSchema).optional().catch(undefined),
    metadata: z.record(z.unknown()).nullish().catch(undefined),
  })
  .passthrough();

type ParsedEntry = z.infer<typeof PromptEntrySchema>;

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})?$/;

function parseTimestampStrict(value: string): Date | null {
  const match = value.trim().match(TIMESTAMP_PATTERN);
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const millis = fraction ? Number.parseInt(fraction.padEnd(3, '0').slice(0, 3), 10) : 0;

  if (zone) {
    const normalized = value.trim().replace(' ', 'T');
    const parsed = new Date(normalized);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  // Naive timestamps are local time, as written by the capture channels.
  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis
  );
  if (
    Number.isNaN(date.getTime()) ||
    date.getMonth() !== Number(month) - 1 ||
    date.getDate() !== Number(day) ||
    date.getHours() !== Number(hour)
  ) {
    return null;
  }
  return date;
}

/**
 * Parse a timestamp written by any channel. Accepts ISO with a `T` or a space
 * separator, with or without fractional seconds. Falls back to now.
 */
export function parseTimestamp(value: string | null | undefined): Date {
  if (value) {
    const parsed = parseTimestampStrict(value);
    if (parsed) {
      return parsed;
    }
  }
  log.warn(`Could not parse timestamp "${value ?? ''}", using current time`);
  return new Date();
}

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/**
 * Local naive ISO timestamp with microseconds, e.g. 2025-05-09T23:15:44.850000
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}000`
  );
}

/**
 * Format used for note keys and journal entries: 2025-05-09 23:15:44
 */
export function formatNoteTimestamp(date: Date): string {
  return formatTimestamp(date).slice(0, 19).replace('T', ' ');
}

export interface CreateRecordOptions {
  id?: string;
  timestamp?: Date;
  /** A label, or a channel's own value kept as rawSource */
  source?: string;
  files?: string[];
  metadata?: Record<string, unknown>;
}

export function createPromptRecord(
  promptText: string,
  llmUsed: string = 'Unknown',
  description: string = '',
  options: CreateRecordOptions = {}
): PromptRecord {
  const record: PromptRecord = {
    id: options.id ?? uuidv4(),
    timestamp: options.timestamp ?? new Date(),
    promptText,
    llmUsed,
    description,
    associatedFiles: uniqueStrings(options.files ?? []),
    fileChanges: {},
    retroactiveNotes: {},
  };
  applySource(record, options.source);
  if (options.metadata) {
    record.metadata = options.metadata;
  }
  return record;
}

function applySource(record: PromptRecord, source: string | null | undefined): void {
  if (isPromptSource(source)) {
    record.source = source;
  } else if (source) {
    record.rawSource = source;
  }
}

function uniqueStrings(values: unknown): string[] {
  if (!Array.isArray(values)) {
    return [];
  }
  const seen = new Set<string>();
  for (const value of values) {
    if (typeof value === 'string' && value.length > 0) {
      seen.add(value);
    }
  }
  return Array.from(seen);
}

function recordFromParsed(entry: ParsedEntry): PromptRecord {
  const files = entry.files !== undefined ? entry.files : entry.associated_files;
  const retroactiveNotes: Record<string, RetroactiveNote> = {};
  for (const [key, note] of Object.entries(entry.retroactive_notes ?? {})) {
    retroactiveNotes[key] = { files: note.files, tokenChange: note.token_change, notes: note.notes };
  }

  const record: PromptRecord = {
    id: entry.id,
    timestamp: parseTimestamp(entry.timestamp),
    promptText: entry.prompt_text,
    llmUsed: entry.model || entry.llm_used || 'Unknown',
    description: entry.description ?? '',
    associatedFiles: uniqueStrings(files),
    fileChanges: { ...(entry.file_changes ?? {}) },
    retroactiveNotes,
  };
  applySource(record, entry.source);
  if (entry.metadata) {
    record.metadata = entry.metadata;
  }
  return record;
}

/**
 * Convert one raw JSON value into a canonical record, or null when it is not a
 * usable prompt entry.
 */
export function recordFromEntry(raw: unknown): PromptRecord | null {
  const result = PromptEntrySchema.safeParse(raw);
  if (!result.success) {
    return null;
  }
  return recordFromParsed(result.data);
}

/**
 * Validate a parsed JSON document as a list of prompt entries. Bad entries are
 * logged and skipped; a non-array document yields an empty list.
 */
export function parsePromptRecords(raw: unknown, origin: string): PromptRecord[] {
  if (!Array.isArray(raw)) {
    log.warn(`Expected an array of prompts in ${origin}, ignoring its contents`);
    return [];
  }

  const records: PromptRecord[] = [];
  raw.forEach((item, index) => {
    const result = PromptEntrySchema.safeParse(item);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.') || 'entry'}: ${issue.message}` : 'invalid entry';
      log.warn(`Skipping malformed prompt #${index} in ${origin} (${where})`);
      return;
    }
    records.push(recordFromParsed(result.data));
  });
  return records;
}

export function recordToEntry(record: PromptRecord): PromptEntry {
  const entry: PromptEntry = {
    id: record.id,
    timestamp: formatTimestamp(record.timestamp),
    prompt_text: record.promptText,
    description: record.description,
    model: record.llmUsed,
    files: [...record.associatedFiles],
  };
  const source = record.source ?? record.rawSource;
  if (source) {
    entry.source = source;
  }
  if (Object.keys(record.fileChanges).length > 0) {
    entry.file_changes = { ...record.fileChanges };
  }
  const notes = Object.entries(record.retroactiveNotes);
  if (notes.length > 0) {
    entry.retroactive_notes = {};
    for (const [key, note] of notes) {
      entry.retroactive_notes[key] = { files: [...note.files], token_change: note.tokenChange, notes: note.notes };
    }
  }
  if (record.metadata) {
    entry.metadata = record.metadata;
  }
  return entry;
}

/**
 * Newest first. Storage order is merge order; only display sorts.
 */
export function sortNewestFirst(records: PromptRecord[]): PromptRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => {
      const diff = b.record.timestamp.getTime() - a.record.timestamp.getTime();
      return diff !== 0 ? diff : b.index - a.index;
    })
    .map(entry => entry.record);
}
