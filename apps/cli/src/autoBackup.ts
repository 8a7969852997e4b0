import * as fs from 'fs';
import * as path from 'path';
import type { AutoBackupSettings, ChangeVerdict } from '@promptlink/types';
import { createLogger, describeError } from './log';
import { NotesJournal, DEFAULT_PROJECT } from './notes';
import type { PromptSession } from './session';
import { ChangeDetector, cooldownActive, cooldownRemainingMinutes, matchesGlob } from './significance';
import { buildSnapshotFromDisk } from './snapshot';
import { countTokens } from './tokens';

const log = createLogger('backup');

export const AUTO_BACKUP_PREFIX = 'auto_backup_';
export const AUTO_BACKUP_FOOTER = 'End of Auto-Backup';

export type BackupResult =
  | { ok: true; path: string; files: number; totalTokens: number }
  | { ok: false; error: string };

export interface BatchOutcome {
  verdicts: ChangeVerdict[];
  /** Paths attributed to the active prompt */
  associated: string[];
  significant: ChangeVerdict[];
  /** Significant changes dropped because the cooldown was active */
  suppressed: boolean;
  backup: BackupResult | null;
}

export interface AutoBackupOptions {
  settings: AutoBackupSettings;
  detector: ChangeDetector;
  session: PromptSession;
  journal: NotesJournal;
  backupsDir: string;
  project?: string;
  /** Called after lastBackupTime changes so it can be persisted */
  onSettingsChange?: (settings: AutoBackupSettings) => void;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * 20250509_231544
 */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

const formatSigned = (value: number): string => `${value >= 0 ? '+' : '-'}${Math.abs(value).toLocaleString('en-US')}`;

function uniquePath(dir: string, baseName: string, extension: string): string {
  let candidate = path.join(dir, `${baseName}${extension}`);
  for (let suffix = 1; fs.existsSync(candidate); suffix += 1) {
    candidate = path.join(dir, `${baseName}_${suffix}${extension}`);
  }
  return candidate;
}

/**
 * Turns batches of file changes into prompt associations and snapshots
 */
export class AutoBackup {
  private settings: AutoBackupSettings;
  private readonly detector: ChangeDetector;
  private readonly session: PromptSession;
  private readonly journal: NotesJournal;
  private readonly backupsDir: string;
  private readonly project: string;
  private readonly onSettingsChange?: (settings: AutoBackupSettings) => void;

  constructor(options: AutoBackupOptions) {
    this.settings = options.settings;
    this.detector = options.detector;
    this.session = options.session;
    this.journal = options.journal;
    this.backupsDir = options.backupsDir;
    this.project = options.project ?? DEFAULT_PROJECT;
    this.onSettingsChange = options.onSettingsChange;
  }

  get currentSettings(): AutoBackupSettings {
    return this.settings;
  }

  updateSettings(settings: AutoBackupSettings): void {
    this.settings = settings;
    this.detector.updateSettings(settings);
  }

  /**
   * Handle one debounced batch. Every monitored path is evaluated and, while
   * a prompt is active, associated with it. The cooldown is checked once for
   * the whole batch before any snapshot is written.
   */
  processBatch(paths: Iterable<string>, now: Date = new Date()): BatchOutcome {
    const verdicts: ChangeVerdict[] = [];
    const associated: string[] = [];

    for (const filePath of paths) {
      if (!this.detector.shouldMonitor(filePath)) {
        continue;
      }
      const verdict = this.detector.evaluateFile(filePath);
      if (!verdict) {
        continue;
      }
      verdicts.push(verdict);

      const delta = verdict.significant ? verdict.tokenChange : verdict.tokens;
      if (this.session.recordAssociation(verdict.path, delta)) {
        associated.push(verdict.path);
      }
    }

    const active = this.session.active;
    if (active && associated.length > 0) {
      log.info(`Associated ${associated.length} file(s) with prompt ${active.id}`);
    }

    const significant = verdicts.filter(verdict => verdict.significant);
    if (significant.length === 0) {
      return { verdicts, associated, significant, suppressed: false, backup: null };
    }

    if (cooldownActive(this.settings.lastBackupTime, this.settings.cooldownMinutes, now)) {
      const remaining = cooldownRemainingMinutes(this.settings.lastBackupTime, this.settings.cooldownMinutes, now);
      log.info(`Cooldown period active. Next auto-backup available in ${remaining.toFixed(1)} minutes`);
      return { verdicts, associated, significant, suppressed: true, backup: null };
    }

    const backup = this.triggerBackup(significant, now);
    return { verdicts, associated, significant, suppressed: false, backup };
  }

  /**
   * Write a snapshot of the changed files plus every monitored file, then
   * journal it and prune old snapshots.
   */
  triggerBackup(changes: ChangeVerdict[], now: Date = new Date()): BackupResult {
    const totalChange = changes.reduce((sum, change) => sum + change.tokenChange, 0);
    const files = changes.map(change => change.path);
    for (const file of this.settings.monitorFiles) {
      const resolved = path.resolve(file);
      if (
        !files.includes(resolved) &&
        !this.detector.isExcluded(resolved) &&
        fs.existsSync(resolved) &&
        fs.statSync(resolved).isFile()
      ) {
        files.push(resolved);
      }
    }

    const active = this.session.active;
    const headerLines = [
      `Auto-Backup generated on ${now.toLocaleString('en-US')}`,
      `Changed files: ${changes.length}, Total token changes: ${totalChange}`,
    ];
    if (active) {
      headerLines.push(`Active Prompt: ${active.description || 'Untitled'} (${active.llmUsed}) [${active.id}]`);
      headerLines.push('', 'Prompt Text:', active.promptText);
    }

    const text = buildSnapshotFromDisk(files, headerLines.join('\n'), AUTO_BACKUP_FOOTER);
    const totalTokens = countTokens(text);

    let outputPath: string;
    try {
      fs.mkdirSync(this.backupsDir, { recursive: true });
      outputPath = uniquePath(
        this.backupsDir,
        `${AUTO_BACKUP_PREFIX}${formatFileStamp(now)}_${changes.length}files_${totalChange}tokens`,
        '.md'
      );
      fs.writeFileSync(outputPath, text, 'utf-8');
    } catch (error) {
      log.error('Error creating auto-backup', error);
      return { ok: false, error: `Could not write auto-backup: ${describeError(error)}` };
    }
    log.info(`Auto-backup created: ${outputPath}`);

    // The cooldown starts only once a snapshot exists.
    this.settings = { ...this.settings, lastBackupTime: now };
    this.detector.updateSettings(this.settings);
    this.onSettingsChange?.(this.settings);

    const noteLines = [
      `Auto-Backup Created: ${path.basename(outputPath)}`,
      '',
      `Total files: ${changes.length}`,
      `Total tokens: ${totalTokens.toLocaleString('en-US')}`,
      '',
    ];
    if (active) {
      noteLines.push(
        `Active Prompt: ${active.description || 'Untitled'}`,
        `LLM Used: ${active.llmUsed}`,
        '',
        'Prompt Text:',
        active.promptText,
        ''
      );
    }
    noteLines.push('Changed files:', ...changes.map(change => `- ${change.path} (${formatSigned(change.tokenChange)} tokens)`));
    const noted = this.journal.saveNote(noteLines.join('\n'), this.project, now);
    if (!noted.ok) {
      log.warn(noted.error);
    }

    this.pruneBackups();

    if (this.settings.notificationEnabled) {
      log.info(
        `Auto-backup has been created with ${changes.length} changed files. Total tokens: ${totalTokens.toLocaleString('en-US')}`
      );
    }

    return { ok: true, path: outputPath, files: files.length, totalTokens };
  }

  /**
   * Every monitored file that exists, with folders walked recursively and
   * ignore patterns applied
   */
  listMonitoredFiles(): string[] {
    const files = new Set<string>();
    for (const file of this.settings.monitorFiles) {
      const resolved = path.resolve(file);
      if (!this.detector.isExcluded(resolved) && fs.existsSync(resolved) && fs.statSync(resolved).isFile()) {
        files.add(resolved);
      }
    }

    const walk = (dir: string): void => {
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(dir, { withFileTypes: true });
      } catch (error) {
        log.warn(`Could not list ${dir}`, error);
        return;
      }
      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (this.detector.isExcluded(full)) {
          continue;
        }
        if (entry.isDirectory()) {
          walk(full);
        } else if (entry.isFile() && !this.settings.ignoredPatterns.some(pattern => matchesGlob(entry.name, pattern))) {
          files.add(full);
        }
      }
    };
    for (const folder of this.settings.monitorFolders) {
      const resolved = path.resolve(folder);
      if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
        walk(resolved);
      }
    }

    return Array.from(files).sort();
  }

  /**
   * Snapshot every monitored file now, ignoring the cooldown. Each file's
   * full token count stands in for its change.
   */
  forceBackup(now: Date = new Date()): BackupResult {
    const files = this.listMonitoredFiles();
    if (files.length === 0) {
      return { ok: false, error: 'No files to back up. Add files or folders to monitor first.' };
    }
    const changes: ChangeVerdict[] = [];
    for (const file of files) {
      try {
        const tokens = countTokens(fs.readFileSync(file, 'utf-8'));
        changes.push({ path: file, significant: true, tokenChange: tokens, tokens });
      } catch (error) {
        log.warn(`Skipping ${file}, could not read it`, error);
      }
    }
    return this.triggerBackup(changes, now);
  }

  /**
   * Keep the newest maxBackups auto-backups by modification time. Returns the
   * deleted paths.
   */
  pruneBackups(): string[] {
    if (!fs.existsSync(this.backupsDir)) {
      return [];
    }
    const backups = fs
      .readdirSync(this.backupsDir)
      .filter(name => name.startsWith(AUTO_BACKUP_PREFIX) && name.endsWith('.md'))
      .flatMap(name => {
        const full = path.join(this.backupsDir, name);
        // Gone since the listing: nothing left to prune.
        const stat = fs.statSync(full, { throwIfNoEntry: false });
        return stat ? [{ full, mtimeMs: stat.mtimeMs }] : [];
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs || b.full.localeCompare(a.full));

    const pruned: string[] = [];
    for (const backup of backups.slice(this.settings.maxBackups)) {
      try {
        fs.rmSync(backup.full);
        pruned.push(backup.full);
        log.info(`Pruned old auto-backup: ${path.basename(backup.full)}`);
      } catch (error) {
        log.warn(`Error removing old auto-backup ${backup.full}`, error);
      }
    }
    return pruned;
  }
}

/**
 * Write a combined snapshot of the given files into outputDir
 */
export function combineFiles(
  paths: string[],
  outputDir: string,
  header?: string,
  footer?: string,
  now: Date = new Date()
): BackupResult {
  const text = buildSnapshotFromDisk(paths, header, footer);
  const totalTokens = countTokens(text);
  try {
    fs.mkdirSync(outputDir, { recursive: true });
    const outputPath = uniquePath(outputDir, `combined_${formatFileStamp(now)}_${totalTokens}tokens`, '.md');
    fs.writeFileSync(outputPath, text, 'utf-8');
    return { ok: true, path: outputPath, files: paths.length, totalTokens };
  } catch (error) {
    log.error('Error writing combined file', error);
    return { ok: false, error: `Could not write combined file: ${describeError(error)}` };
  }
}
