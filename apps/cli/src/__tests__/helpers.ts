import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AutoBackupSettings } from '@promptlink/types';
import { defaultSettings } from '../config';

/**
 * Temp directories created by a test file, removed by cleanupTempDirs()
 */
const created: string[] = [];

export function makeTempDir(prefix: string = 'promptlink-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  created.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of created.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export const countWordsForTest = (text: string): number => text.split(/\s+/).filter(Boolean).length;

export const words = (count: number): string => Array.from({ length: count }, (_, i) => `w${i}`).join(' ');

export function settingsWith(overrides: Partial<AutoBackupSettings> = {}): AutoBackupSettings {
  return { ...defaultSettings(), ...overrides };
}
