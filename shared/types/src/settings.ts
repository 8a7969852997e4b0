/**
 * Monitoring and auto-backup settings, persisted in settings.json.
 * The per-file baseline cache is not part of this: it lives only as long as
 * the detector that owns it.
 */
export interface AutoBackupSettings {
  enabled: boolean;
  monitorFolders: string[];
  monitorFiles: string[];
  ignoredPatterns: string[];
  minTokenChange: number;
  cooldownMinutes: number;
  maxBackups: number;
  notificationEnabled: boolean;
  lastBackupTime: Date | null;
  activePromptId: string | null;
}

export interface FileBaseline {
  hash: string;
  tokens: number;
}

export interface ChangeVerdict {
  path: string;
  significant: boolean;
  /** Token delta, or the full token count on first observation */
  tokenChange: number;
  /** Token count of the current content */
  tokens: number;
}

export interface RestoreFailure {
  path: string;
  error: string;
}

export interface RestoreResult {
  attempted: number;
  restored: string[];
  failed: RestoreFailure[];
}

export interface JournalNote {
  timestamp: string;
  project: string;
  note: string;
}
