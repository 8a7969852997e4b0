export type { PromptSource, RetroactiveNote, PromptRecord, PromptEntry } from './PromptRecord';
export type { PromptStore, StoredPrompt, NewPromptInput, PromptSearchFilters, WriteResult } from './store';
export type {
  AutoBackupSettings,
  FileBaseline,
  ChangeVerdict,
  RestoreFailure,
  RestoreResult,
  JournalNote,
} from './settings';
