import * as fs from 'fs';
import type { AutoBackupSettings } from '@promptlink/types';
import { AutoBackup } from './autoBackup';
import { getDataPaths, loadSettings, saveSettings } from './config';
import type { DataPaths } from './config';
import { PromptDatabase } from './database';
import { JsonPromptStore } from './jsonStore';
import { createLogger } from './log';
import { NotesJournal } from './notes';
import { PromptSession } from './session';
import { ChangeDetector } from './significance';
import type { TokenCounter } from './significance';
import { RelationalPromptStore } from './store';
import { countTokens } from './tokens';

const log = createLogger('workspace');

export interface WorkspaceOptions {
  /** Open prompts.db even when it does not exist yet */
  createDatabase?: boolean;
}

/**
 * Everything one CLI invocation works with, wired from the data directory
 */
export class Workspace {
  readonly primary: JsonPromptStore;
  readonly capture: JsonPromptStore;
  readonly relational: RelationalPromptStore | null;
  readonly db: PromptDatabase;
  readonly session: PromptSession;
  readonly journal: NotesJournal;
  private current: AutoBackupSettings;

  constructor(readonly paths: DataPaths, options: WorkspaceOptions = {}) {
    this.current = loadSettings(paths.settingsFile);
    this.primary = new JsonPromptStore(paths.promptsFile);
    this.capture = new JsonPromptStore(paths.captureFile);
    this.relational =
      options.createDatabase || fs.existsSync(paths.databaseFile)
        ? new RelationalPromptStore(paths.databaseFile, this.capture)
        : null;
    this.db = new PromptDatabase({ primary: this.primary, capture: this.capture, relational: this.relational });
    this.session = new PromptSession(this.db, activeId => this.persistActive(activeId));
    this.journal = new NotesJournal(paths.notesFile);

    this.db.load();
    const persisted = this.current.activePromptId;
    this.session.rebind(persisted);
    if (persisted && !this.session.active) {
      this.persistActive(null);
    }
  }

  get settings(): AutoBackupSettings {
    return this.current;
  }

  /**
   * Replace and persist the settings. Throws when they cannot be written.
   */
  updateSettings(settings: AutoBackupSettings): void {
    this.current = settings;
    saveSettings(this.paths.settingsFile, settings);
  }

  /**
   * Reload every backend and point the session at the persisted active
   * prompt, which another invocation may have changed.
   */
  reload(): void {
    this.current = { ...this.current, activePromptId: loadSettings(this.paths.settingsFile).activePromptId };
    this.db.load();
    this.session.rebind(this.current.activePromptId);
  }

  /**
   * Change detector for the current settings that never looks inside the
   * data directory
   */
  createDetector(tokenCounter: TokenCounter = countTokens): ChangeDetector {
    return new ChangeDetector(this.current, tokenCounter, [this.paths.dataDir]);
  }

  createAutoBackup(detector: ChangeDetector = this.createDetector()): AutoBackup {
    return new AutoBackup({
      settings: this.current,
      detector,
      session: this.session,
      journal: this.journal,
      backupsDir: this.paths.backupsDir,
      onSettingsChange: next => this.persistLastBackup(next.lastBackupTime),
    });
  }

  close(): void {
    this.relational?.close();
  }

  private persistActive(activeId: string | null): void {
    this.saveOrWarn({ ...this.current, activePromptId: activeId });
  }

  // Auto-backup holds its own copy of the settings; only the timestamp is taken from it.
  private persistLastBackup(lastBackupTime: Date | null): void {
    this.saveOrWarn({ ...this.current, lastBackupTime });
  }

  private saveOrWarn(settings: AutoBackupSettings): void {
    try {
      this.updateSettings(settings);
    } catch (error) {
      log.warn('Could not persist settings', error);
    }
  }
}

export async function openWorkspace(cwd: string = process.cwd(), options: WorkspaceOptions = {}): Promise<Workspace> {
  return new Workspace(await getDataPaths(cwd), options);
}
