import * as fs from 'fs';
import * as path from 'path';
import type { PromptRecord } from '@promptlink/types';
import { formatFileStamp } from './autoBackup';
import { createLogger, describeError } from './log';
import { formatNoteTimestamp, sortNewestFirst } from './record';
import { resolveSource } from './source';

const log = createLogger('export');

export type ExportResult = { ok: true; path: string; count: number } | { ok: false; error: string };

function renderPrompt(record: PromptRecord, position: number): string[] {
  const lines = [
    `## ${position}. ${record.description || 'Untitled Prompt'}`,
    '',
    `- **Date & Time:** ${formatNoteTimestamp(record.timestamp)}`,
    `- **LLM Used:** ${record.llmUsed}`,
    `- **Source:** ${resolveSource(record)}`,
    `- **ID:** ${record.id}`,
    '',
    '### Prompt Text',
    '',
    '```',
    record.promptText,
    '```',
    '',
    '### Associated Files',
    '',
  ];

  if (record.associatedFiles.length === 0) {
    lines.push('No files associated with this prompt.');
  } else {
    for (const file of record.associatedFiles) {
      const change = record.fileChanges[file];
      lines.push(`- \`${file}\` (Token change: ${change === undefined ? 'Unknown' : change})`);
    }
  }

  const notes = Object.entries(record.retroactiveNotes);
  if (notes.length > 0) {
    lines.push('', '### Retroactive Associations', '');
    for (const [key, note] of notes) {
      lines.push(`**${key}**`, '', `- Token Change: ${note.tokenChange}`, `- Notes: ${note.notes}`, '- Files:');
      lines.push(...note.files.map(file => `  - \`${file}\``));
    }
  }

  lines.push('', '---', '');
  return lines;
}

export function renderHistoryMarkdown(records: PromptRecord[], now: Date = new Date()): string {
  const lines = ['# Prompt History Export', `Generated: ${formatNoteTimestamp(now)}`, ''];
  sortNewestFirst(records).forEach((record, index) => {
    lines.push(...renderPrompt(record, index + 1));
  });
  return lines.join('\n');
}

/**
 * Write `prompt_history_<stamp>.md` into outputDir
 */
export function exportHistory(records: PromptRecord[], outputDir: string, now: Date = new Date()): ExportResult {
  const outputPath = path.join(outputDir, `prompt_history_${formatFileStamp(now)}.md`);
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(outputPath, renderHistoryMarkdown(records, now), 'utf-8');
  } catch (error) {
    log.error('Error exporting prompt history', error);
    return { ok: false, error: `Could not write ${outputPath}: ${describeError(error)}` };
  }
  log.info(`Exported prompt history to ${outputPath}`);
  return { ok: true, path: outputPath, count: records.length };
}
