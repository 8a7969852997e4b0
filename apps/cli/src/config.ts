import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { AutoBackupSettings } from '@promptlink/types';
import { getProjectRoot } from './git';
import { createLogger, describeError } from './log';

const log = createLogger('config');

export const DATA_DIR_NAME = '.promptlink';
export const DEFAULT_PORT = 5000;

export interface DataPaths {
  dataDir: string;
  promptsFile: string;
  captureFile: string;
  databaseFile: string;
  settingsFile: string;
  notesFile: string;
  backupsDir: string;
}

export function resolveDataPaths(dataDir: string): DataPaths {
  return {
    dataDir,
    promptsFile: path.join(dataDir, 'prompts.json'),
    captureFile: path.join(dataDir, 'captured_prompts.json'),
    databaseFile: path.join(dataDir, 'prompts.db'),
    settingsFile: path.join(dataDir, 'settings.json'),
    notesFile: path.join(dataDir, 'notes.json'),
    backupsDir: path.join(dataDir, 'backups'),
  };
}

/**
 * PROMPTLINK_HOME, else `.promptlink` under the project root
 */
export async function getDataPaths(cwd: string = process.cwd()): Promise<DataPaths> {
  const override = process.env.PROMPTLINK_HOME;
  if (override) {
    return resolveDataPaths(path.resolve(override));
  }
  const root = await getProjectRoot(cwd);
  return resolveDataPaths(path.join(root, DATA_DIR_NAME));
}

export function getServerPort(): number {
  const raw = process.env.PROMPTLINK_PORT;
  if (!raw) {
    return DEFAULT_PORT;
  }
  const port = Number.parseInt(raw, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    log.warn(`Ignoring invalid PROMPTLINK_PORT "${raw}", using ${DEFAULT_PORT}`);
    return DEFAULT_PORT;
  }
  return port;
}

export const DEFAULT_IGNORED_PATTERNS = ['*.tmp', '*.bak', '*~'];

export function defaultSettings(): AutoBackupSettings {
  return {
    enabled: false,
    monitorFolders: [],
    monitorFiles: [],
    ignoredPatterns: [...DEFAULT_IGNORED_PATTERNS],
    minTokenChange: 50,
    cooldownMinutes: 5,
    maxBackups: 10,
    notificationEnabled: true,
    lastBackupTime: null,
    activePromptId: null,
  };
}

const stringList = z.array(z.string());

// Every key is optional and a bad value falls back to its default.
const SettingsFileSchema = z.object({
  enabled: z.boolean().optional().catch(undefined),
  monitor_folders: stringList.optional().catch(undefined),
  monitor_files: stringList.optional().catch(undefined),
  ignored_patterns: stringList.optional().catch(undefined),
  min_token_change: z.number().int().nonnegative().optional().catch(undefined),
  cooldown_minutes: z.number().nonnegative().optional().catch(undefined),
  max_backups: z.number().int().positive().optional().catch(undefined),
  notification_enabled: z.boolean().optional().catch(undefined),
  last_backup_time: z.string().nullish().catch(undefined),
  active_prompt_id: z.string().nullish().catch(undefined),
});

type SettingsFile = z.infer<typeof SettingsFileSchema>;

const parseDate = (value: string | null | undefined): Date | null => {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

export function settingsFromFile(raw: unknown): AutoBackupSettings {
  const defaults = defaultSettings();
  const result = SettingsFileSchema.safeParse(raw);
  if (!result.success) {
    log.warn('Settings file is not an object, using defaults');
    return defaults;
  }
  const file = result.data;
  return {
    enabled: file.enabled ?? defaults.enabled,
    monitorFolders: file.monitor_folders ?? defaults.monitorFolders,
    monitorFiles: file.monitor_files ?? defaults.monitorFiles,
    ignoredPatterns: file.ignored_patterns ?? defaults.ignoredPatterns,
    minTokenChange: file.min_token_change ?? defaults.minTokenChange,
    cooldownMinutes: file.cooldown_minutes ?? defaults.cooldownMinutes,
    maxBackups: file.max_backups ?? defaults.maxBackups,
    notificationEnabled: file.notification_enabled ?? defaults.notificationEnabled,
    lastBackupTime: parseDate(file.last_backup_time),
    activePromptId: file.active_prompt_id ?? null,
  };
}

export function settingsToFile(settings: AutoBackupSettings): Required<SettingsFile> {
  return {
    enabled: settings.enabled,
    monitor_folders: settings.monitorFolders,
    monitor_files: settings.monitorFiles,
    ignored_patterns: settings.ignoredPatterns,
    min_token_change: settings.minTokenChange,
    cooldown_minutes: settings.cooldownMinutes,
    max_backups: settings.maxBackups,
    notification_enabled: settings.notificationEnabled,
    last_backup_time: settings.lastBackupTime ? settings.lastBackupTime.toISOString() : null,
    active_prompt_id: settings.activePromptId,
  };
}

export function loadSettings(settingsFile: string): AutoBackupSettings {
  if (!fs.existsSync(settingsFile)) {
    return defaultSettings();
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(settingsFile, 'utf-8'));
    return settingsFromFile(parsed);
  } catch (error) {
    log.warn(`Could not read ${settingsFile}, using defaults`, error);
    return defaultSettings();
  }
}

export function saveSettings(settingsFile: string, settings: AutoBackupSettings): void {
  try {
    fs.mkdirSync(path.dirname(settingsFile), { recursive: true });
    fs.writeFileSync(settingsFile, JSON.stringify(settingsToFile(settings), null, 2), 'utf-8');
  } catch (error) {
    throw new Error(`Could not save settings to ${settingsFile}: ${describeError(error)}`);
  }
}

export const EDITABLE_SETTINGS = [
  'enabled',
  'monitor_folders',
  'monitor_files',
  'ignored_patterns',
  'min_token_change',
  'cooldown_minutes',
  'max_backups',
  'notification_enabled',
] as const;

export type EditableSetting = (typeof EDITABLE_SETTINGS)[number];

export function isEditableSetting(key: string): key is EditableSetting {
  return EDITABLE_SETTINGS.some(setting => setting === key);
}

const parseBoolean = (key: string, value: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', 'yes', 'on', '1'].includes(normalized)) return true;
  if (['false', 'no', 'off', '0'].includes(normalized)) return false;
  throw new Error(`${key} must be true or false, got "${value}"`);
};

const parseNumber = (key: string, value: string, { integer, min }: { integer: boolean; min: number }): number => {
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed)) || parsed < min) {
    throw new Error(`${key} must be ${integer ? 'an integer' : 'a number'} >= ${min}, got "${value}"`);
  }
  return parsed;
};

const parseList = (value: string): string[] =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

/**
 * Apply a `config <key> <value>` edit. Lists are comma separated and replace
 * the current value. Throws on an unknown key or an invalid value.
 */
export function applySettingUpdate(settings: AutoBackupSettings, key: string, value: string): AutoBackupSettings {
  if (!isEditableSetting(key)) {
    throw new Error(`Unknown setting "${key}". Editable: ${EDITABLE_SETTINGS.join(', ')}`);
  }

  switch (key) {
    case 'enabled':
      return { ...settings, enabled: parseBoolean(key, value) };
    case 'notification_enabled':
      return { ...settings, notificationEnabled: parseBoolean(key, value) };
    case 'monitor_folders':
      return { ...settings, monitorFolders: parseList(value).map(folder => path.resolve(folder)) };
    case 'monitor_files':
      return { ...settings, monitorFiles: parseList(value).map(file => path.resolve(file)) };
    case 'ignored_patterns':
      return { ...settings, ignoredPatterns: parseList(value) };
    case 'min_token_change':
      return { ...settings, minTokenChange: parseNumber(key, value, { integer: true, min: 0 }) };
    case 'cooldown_minutes':
      return { ...settings, cooldownMinutes: parseNumber(key, value, { integer: false, min: 0 }) };
    case 'max_backups':
      return { ...settings, maxBackups: parseNumber(key, value, { integer: true, min: 1 }) };
  }
}
