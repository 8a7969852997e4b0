import * as fs from 'fs';
import * as path from 'path';
import { createTwoFilesPatch } from 'diff';
import type { RestoreResult } from '@promptlink/types';
import { createLogger, describeError } from './log';

const log = createLogger('snapshot');

export interface SnapshotFile {
  path: string;
  content: string;
}

const SECTION_HEADER = /^### (.+)$/m;
/** A bare `###` line closes the last section; whatever follows is the footer */
const FOOTER_MARKER = '###';
const FOOTER_LINE = /^###$/m;
const ESCAPED_LINE = /^(\\*)###(?= |$)/gm;
const UNESCAPED_LINE = /^\\(\\*)###(?= |$)/gm;

/**
 * Lines of content that look like a section header or the footer marker get
 * one more leading backslash, so `### notes` inside a file reads back as
 * content.
 */
const escapeContent = (text: string): string => text.replace(ESCAPED_LINE, '\\$1###');
const unescapeContent = (text: string): string => text.replace(UNESCAPED_LINE, '$1###');

/**
 * Concatenate files into one text blob: an optional header, then a
 * `### <path>` section per file, then an optional footer after a `###` line.
 */
export function encodeSnapshot(files: SnapshotFile[], header?: string, footer?: string): string {
  const lines: string[] = [];
  if (header) {
    lines.push(escapeContent(header), '');
  }
  for (const file of files) {
    lines.push(`### ${file.path}`, '', escapeContent(file.content), '');
  }
  if (footer) {
    lines.push(FOOTER_MARKER, escapeContent(footer));
  }
  return lines.join('\n');
}

const stripPrefix = (text: string, prefix: string): string => (text.startsWith(prefix) ? text.slice(prefix.length) : text);
const stripSuffix = (text: string, suffix: string): string => (text.endsWith(suffix) ? text.slice(0, -suffix.length) : text);

/**
 * Split a blob back into path -> content. Text before the first section is
 * the header and text after the footer marker is the footer; both are
 * ignored. A repeated path keeps its last content.
 */
export function decodeSnapshot(blob: string): Map<string, string> {
  const files = new Map<string, string>();
  const footerStart = blob.search(FOOTER_LINE);
  const hasFooter = footerStart !== -1;
  const pieces = (hasFooter ? blob.slice(0, footerStart) : blob).split(SECTION_HEADER);

  for (let i = 1; i + 1 < pieces.length; i += 2) {
    const filePath = pieces[i].trim();
    const isLast = i + 2 >= pieces.length;
    let body = stripPrefix(pieces[i + 1], '\n\n');
    // Sections end with a blank line; the last one without a footer ends the blob.
    body = stripSuffix(body, isLast && !hasFooter ? '\n' : '\n\n');
    files.set(filePath, unescapeContent(body));
  }

  return files;
}

/**
 * Decode a snapshot file. Unreadable files give an empty map.
 */
export function readSnapshotFile(snapshotPath: string): Map<string, string> {
  try {
    return decodeSnapshot(fs.readFileSync(snapshotPath, 'utf-8'));
  } catch (error) {
    log.warn(`Could not parse snapshot ${snapshotPath}`, error);
    return new Map();
  }
}

/**
 * Read files from disk into snapshot sections. An unreadable file keeps its
 * section with the error in place of its content.
 */
export function readSnapshotFiles(paths: string[]): SnapshotFile[] {
  return paths.map(filePath => {
    try {
      return { path: filePath, content: fs.readFileSync(filePath, 'utf-8') };
    } catch (error) {
      log.warn(`Could not read ${filePath} for snapshot`, error);
      return { path: filePath, content: `Error reading file: ${describeError(error)}` };
    }
  });
}

export function buildSnapshotFromDisk(paths: string[], header?: string, footer?: string): string {
  return encodeSnapshot(readSnapshotFiles(paths), header, footer);
}

/**
 * Write each target back from the snapshot. Every path is attempted on its
 * own; failures are collected rather than thrown.
 */
export function restoreFiles(contents: Map<string, string>, targets: string[]): RestoreResult {
  const result: RestoreResult = { attempted: 0, restored: [], failed: [] };

  for (const target of targets) {
    result.attempted += 1;
    const content = contents.get(target);
    if (content === undefined) {
      result.failed.push({ path: target, error: 'Not present in snapshot' });
      continue;
    }
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content, 'utf-8');
      result.restored.push(target);
    } catch (error) {
      log.warn(`Failed to restore ${target}`, error);
      result.failed.push({ path: target, error: describeError(error) });
    }
  }

  return result;
}

export const NEW_FILE_MESSAGE = 'Current file does not exist - this would be a new file creation.';
export const NO_DIFFERENCES_MESSAGE = 'No differences found.';

/**
 * Unified diff from the live file to the snapshot's content
 */
export function diffAgainstSnapshot(filePath: string, snapshotContent: string): string {
  if (!fs.existsSync(filePath)) {
    return NEW_FILE_MESSAGE;
  }
  const current = fs.readFileSync(filePath, 'utf-8');
  if (current === snapshotContent) {
    return NO_DIFFERENCES_MESSAGE;
  }
  return createTwoFilesPatch(`Current: ${filePath}`, `Backup: ${filePath}`, current, snapshotContent);
}
