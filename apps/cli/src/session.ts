import type { PromptRecord } from '@promptlink/types';
import type { PromptDatabase } from './database';
import { createLogger } from './log';

const log = createLogger('session');

export type SessionState = { kind: 'idle' } | { kind: 'active'; prompt: PromptRecord };

/**
 * The single prompt currently in focus. File changes observed while a prompt
 * is active are attributed to it. The session holds a reference into the
 * database collection, so associations mutate the stored record directly
 * and are saved immediately.
 */
export class PromptSession {
  private current: SessionState = { kind: 'idle' };

  constructor(
    private readonly db: PromptDatabase,
    private readonly onActiveChange?: (activeId: string | null) => void
  ) {}

  get state(): SessionState {
    return this.current;
  }

  get active(): PromptRecord | null {
    return this.current.kind === 'active' ? this.current.prompt : null;
  }

  /**
   * Replace the focus. A record not yet in the database is added first.
   */
  setActive(record: PromptRecord): PromptRecord {
    const ref = this.db.get(record.id) ?? this.db.add(record);
    this.current = { kind: 'active', prompt: ref };
    log.debug(`Active prompt: ${ref.id}`);
    this.onActiveChange?.(ref.id);
    return ref;
  }

  /**
   * Activate a stored prompt by id. Returns null when the id is unknown.
   */
  activate(id: string): PromptRecord | null {
    const record = this.db.get(id);
    if (!record) {
      return null;
    }
    return this.setActive(record);
  }

  clear(): void {
    const wasActive = this.current.kind === 'active';
    this.current = { kind: 'idle' };
    if (wasActive) {
      this.onActiveChange?.(null);
    }
  }

  /**
   * Attribute a file change to the active prompt. The path is added once;
   * the token change is overwritten on every call. Returns false when idle.
   */
  recordAssociation(filePath: string, tokenChange: number): boolean {
    const prompt = this.active;
    if (!prompt) {
      return false;
    }
    if (!prompt.associatedFiles.includes(filePath)) {
      prompt.associatedFiles.push(filePath);
    }
    prompt.fileChanges[filePath] = tokenChange;
    this.db.saveOrWarn();
    return true;
  }

  /**
   * Re-point the reference after the database reloaded. Clears the session
   * when the active prompt is gone.
   */
  rebind(activeId: string | null = this.active ? this.active.id : null): void {
    if (!activeId) {
      this.clear();
      return;
    }
    const record = this.db.get(activeId);
    if (!record) {
      log.warn(`Active prompt ${activeId} no longer exists, clearing it`);
      this.clear();
      return;
    }
    this.current = { kind: 'active', prompt: record };
  }

  /**
   * Delete a prompt, clearing the focus when it pointed there
   */
  removePrompt(id: string): boolean {
    if (this.active && this.active.id === id) {
      this.clear();
    }
    return this.db.remove(id);
  }
}
