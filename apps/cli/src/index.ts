#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import kleur from 'kleur';
import type { PromptRecord } from '@promptlink/types';
import { combineFiles } from './autoBackup';
import { applySettingUpdate, getDataPaths, getServerPort, saveSettings, settingsToFile } from './config';
import { isRetroTokenPreset } from './database';
import type { RetroTokenOption } from './database';
import { exportHistory } from './exportHistory';
import { describeError } from './log';
import { formatRollbackNote, formatRetroactiveNote } from './notes';
import { confirm } from './prompt';
import { createPromptRecord, formatNoteTimestamp, isPromptSource, PROMPT_SOURCES, sortNewestFirst } from './record';
import { startServer } from './server';
import { diffAgainstSnapshot, readSnapshotFile, restoreFiles } from './snapshot';
import { resolveSource } from './source';
import { ChangeMonitor, RecordFilePoller } from './watch';
import { openWorkspace, Workspace } from './workspace';

const program = new Command();

program
  .name('promptlink')
  .description('Track prompts sent to LLMs and link them to the file changes they produced')
  .version('0.1.0');

/**
 * Run a command against the workspace, printing `Error: <message>` and
 * exiting 1 on failure
 */
const withWorkspace =
  <A extends unknown[]>(action: (ws: Workspace, ...args: A) => void | Promise<void>) =>
  async (...args: A): Promise<void> => {
    let ws: Workspace | null = null;
    try {
      ws = await openWorkspace();
      await action(ws, ...args);
    } catch (error) {
      console.error(kleur.red(`Error: ${describeError(error)}`));
      process.exitCode = 1;
    } finally {
      ws?.close();
    }
  };

function fail(message: string): never {
  throw new Error(message);
}

const requirePrompt = (ws: Workspace, id: string): PromptRecord => ws.db.get(id) ?? fail(`Prompt not found: ${id}`);

const preview = (text: string, length: number = 50): string =>
  text.length > length ? `${text.substring(0, length)}...` : text;

const parseInteger = (value: string, label: string): number => {
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fail(`${label} must be a number, got "${value}"`) : parsed;
};

function printPrompt(record: PromptRecord, active: PromptRecord | null): void {
  const marker = active && active.id === record.id ? kleur.green(' (active)') : '';
  console.log(`[${record.llmUsed}] ${preview(record.promptText)}${marker}`);
  console.log(`   ID: ${record.id}`);
  console.log(`   Date: ${formatNoteTimestamp(record.timestamp)}`);
  console.log(`   Source: ${resolveSource(record)}`);
  console.log(`   Files: ${record.associatedFiles.length}`);
  console.log('');
}

program
  .command('init')
  .description('Create the promptlink data directory in the current project')
  .action(async () => {
    try {
      const paths = await getDataPaths();
      fs.mkdirSync(paths.backupsDir, { recursive: true });
      const ws = new Workspace(paths, { createDatabase: true });
      try {
        if (!fs.existsSync(paths.settingsFile)) {
          saveSettings(paths.settingsFile, ws.settings);
        }
        if (!ws.primary.exists()) {
          const saved = ws.db.save();
          if (!saved.ok) {
            fail(saved.error);
          }
        }
      } finally {
        ws.close();
      }

      console.log(`Initialized promptlink in ${paths.dataDir}`);
      console.log(`Prompts: ${paths.promptsFile}`);
      console.log(`Database: ${paths.databaseFile}`);
      console.log(`Settings: ${paths.settingsFile}`);
      console.log('');
      console.log(kleur.blue('Record a prompt with `promptlink record "<text>"`, then run `promptlink watch`.'));
    } catch (error) {
      console.error(kleur.red(`Error: ${describeError(error)}`));
      process.exitCode = 1;
    }
  });

program
  .command('record <text>')
  .description('Record a prompt and make it the active one')
  .option('-l, --llm <name>', 'LLM the prompt was sent to', 'Unknown')
  .option('-d, --description <text>', 'Short description', '')
  .option('-s, --source <label>', `Capture channel (${PROMPT_SOURCES.join(', ')})`)
  .option('--no-activate', 'Record without making it active')
  .action(
    withWorkspace(
      (ws: Workspace, text: string, options: { llm: string; description: string; source?: string; activate: boolean }) => {
        if (!text.trim()) {
          fail('Prompt text is empty');
        }
        if (options.source !== undefined && !isPromptSource(options.source)) {
          fail(`Unknown source "${options.source}". Use one of: ${PROMPT_SOURCES.join(', ')}`);
        }
        const record = createPromptRecord(text, options.llm, options.description, {
          source: isPromptSource(options.source) ? options.source : undefined,
        });
        if (options.activate) {
          ws.session.setActive(record);
        } else {
          ws.db.add(record);
        }
        console.log(`Recorded prompt ${record.id}${options.activate ? kleur.green(' (active)') : ''}`);
      }
    )
  );

program
  .command('list')
  .description('List recorded prompts, newest first')
  .option('-n, --limit <number>', 'Number of prompts to show', '10')
  .option('--hours <number>', 'Only prompts from the last N hours')
  .action(
    withWorkspace((ws: Workspace, options: { limit: string; hours?: string }) => {
      const limit = parseInteger(options.limit, 'limit');
      const records =
        options.hours === undefined ? [...ws.db.prompts] : ws.db.getRecent(parseInteger(options.hours, 'hours'));
      const shown = sortNewestFirst(records).slice(0, limit);
      if (shown.length === 0) {
        console.log('No prompts found.');
        return;
      }
      console.log(`\nShowing ${shown.length} of ${records.length} prompt(s):\n`);
      shown.forEach(record => printPrompt(record, ws.session.active));
    })
  );

program
  .command('show <id>')
  .description('Show a prompt with its associated files')
  .action(
    withWorkspace((ws: Workspace, id: string) => {
      const record = requirePrompt(ws, id);
      console.log('\n=== Prompt ===\n');
      console.log(`ID: ${record.id}`);
      console.log(`LLM: ${record.llmUsed}`);
      console.log(`Date: ${formatNoteTimestamp(record.timestamp)}`);
      console.log(`Source: ${resolveSource(record)}`);
      console.log(`Description: ${record.description || 'Untitled'}`);
      console.log(`\nPrompt:\n${record.promptText}`);
      console.log(`\nFiles (${record.associatedFiles.length}):`);
      for (const file of record.associatedFiles) {
        const change = record.fileChanges[file];
        console.log(`  - ${file} (${change === undefined ? 'Unknown' : change} tokens)`);
      }
      const notes = Object.entries(record.retroactiveNotes);
      if (notes.length > 0) {
        console.log('\nRetroactive associations:');
        for (const [key, note] of notes) {
          console.log(`  ${key}: ${note.files.length} file(s), ${note.tokenChange} tokens, ${note.notes}`);
        }
      }
    })
  );

program
  .command('search [text]')
  .description('Search prompts by text, LLM, source, file or date')
  .option('--llm <name>', 'LLM name contains')
  .option('--source <source>', 'Exact capture source')
  .option('--file <path>', 'Associated with this file')
  .option('--since <date>', 'On or after this ISO date')
  .option('--until <date>', 'On or before this ISO date')
  .option('-n, --limit <number>', 'Maximum results', '100')
  .action(
    withWorkspace(
      (
        ws: Workspace,
        text: string | undefined,
        options: { llm?: string; source?: string; file?: string; since?: string; until?: string; limit: string }
      ) => {
        const filePath = options.file ? path.resolve(options.file) : undefined;
        const limit = parseInteger(options.limit, 'limit');
        let ids: string[];
        if (ws.relational) {
          ids = ws.relational
            .searchPrompts({
              text,
              llmName: options.llm,
              source: options.source,
              filePath,
              startDate: options.since,
              endDate: options.until,
              limit,
            })
            .map(row => row.id);
        } else {
          let matches = text ? ws.db.search(text) : [...ws.db.prompts];
          if (filePath) {
            const linked = new Set(ws.db.getPromptsForFile(filePath).map(record => record.id));
            matches = matches.filter(record => linked.has(record.id));
          }
          ids = sortNewestFirst(matches)
            .slice(0, limit)
            .map(record => record.id);
        }

        const results = ids.map(id => ws.db.get(id)).filter((record): record is PromptRecord => record !== undefined);
        if (results.length === 0) {
          console.log('No matching prompts.');
          return;
        }
        results.forEach(record => printPrompt(record, ws.session.active));
      }
    )
  );

program
  .command('activate <id>')
  .description('Attribute subsequent file changes to this prompt')
  .action(
    withWorkspace((ws: Workspace, id: string) => {
      const record = ws.session.activate(id) ?? fail(`Prompt not found: ${id}`);
      console.log(`Active prompt: ${record.description || preview(record.promptText)} [${record.id}]`);
    })
  );

program
  .command('deactivate')
  .description('Stop attributing file changes to a prompt')
  .action(
    withWorkspace((ws: Workspace) => {
      const active = ws.session.active;
      ws.session.clear();
      console.log(active ? `Deactivated prompt ${active.id}` : 'No prompt was active.');
    })
  );

program
  .command('associate <id> <files...>')
  .description('Link files to a prompt')
  .option('-t, --tokens <number>', 'Token change to record for the new files')
  .action(
    withWorkspace((ws: Workspace, id: string, files: string[], options: { tokens?: string }) => {
      const resolved = files.map(file => path.resolve(file));
      const tokenChange = options.tokens === undefined ? undefined : parseInteger(options.tokens, 'tokens');
      const added = ws.db.associateFiles(id, resolved, tokenChange);
      if (added === null) {
        fail(`Prompt not found: ${id}`);
      }
      if (ws.relational && ws.relational.hasPrompt(id)) {
        ws.relational.associateFiles(id, resolved, tokenChange);
      }
      console.log(`Associated ${added ?? 0} new file(s) with prompt ${id}`);
    })
  );

const parseRetroOption = (value: string): RetroTokenOption => {
  if (isRetroTokenPreset(value)) {
    return value;
  }
  return parseInteger(value, 'token change');
};

program
  .command('retro <id> <files...>')
  .description('Associate files with a prompt after the fact')
  .option('-t, --tokens <option>', 'Auto, Minor, Moderate, Major or a number', 'Auto')
  .option('-n, --notes <text>', 'Notes kept with the association', '')
  .action(
    withWorkspace((ws: Workspace, id: string, files: string[], options: { tokens: string; notes: string }) => {
      const record = requirePrompt(ws, id);
      const resolved = files.map(file => path.resolve(file));
      const result =
        ws.db.addRetroactiveAssociation(id, resolved, parseRetroOption(options.tokens), options.notes) ??
        fail(`Prompt not found: ${id}`);

      if (options.notes.trim()) {
        const noted = ws.journal.saveNote(
          formatRetroactiveNote(record.description, formatNoteTimestamp(record.timestamp), resolved, options.notes)
        );
        if (!noted.ok) {
          console.log(kleur.yellow(`Warning: ${noted.error}`));
        }
      }
      console.log(
        `Associated ${result.newlyAdded} new file(s) with prompt ${id} (${result.tokenChange} tokens each)`
      );
    })
  );

program
  .command('delete <id>')
  .description('Delete a prompt from every store')
  .action(
    withWorkspace((ws: Workspace, id: string) => {
      console.log(ws.session.removePrompt(id) ? `Deleted prompt ${id}` : `Prompt ${id} not found, nothing to delete.`);
    })
  );

program
  .command('import-db [file]')
  .description('Import a prompts JSON file into the SQLite database')
  .action(
    withWorkspace((ws: Workspace, file: string | undefined) => {
      const relational = ws.relational ?? fail('No database yet. Run `promptlink init` first.');
      const source = file ? path.resolve(file) : ws.paths.promptsFile;
      console.log(`Imported ${relational.importFromJson(source)} prompt(s) from ${source}`);
    })
  );

program
  .command('export-db [file]')
  .description('Append database prompts missing from a JSON file')
  .action(
    withWorkspace((ws: Workspace, file: string | undefined) => {
      const relational = ws.relational ?? fail('No database yet. Run `promptlink init` first.');
      const target = file ? path.resolve(file) : ws.paths.captureFile;
      console.log(`Exported ${relational.exportToJson(target)} prompt(s) to ${target}`);
    })
  );

program
  .command('export')
  .description('Export the prompt history as markdown')
  .option('-o, --output <dir>', 'Output directory')
  .action(
    withWorkspace((ws: Workspace, options: { output?: string }) => {
      const outputDir = options.output ? path.resolve(options.output) : path.join(ws.paths.dataDir, 'exports');
      const result = exportHistory([...ws.db.prompts], outputDir);
      if (!result.ok) {
        fail(result.error);
      } else {
        console.log(`Exported ${result.count} prompt(s) to ${result.path}`);
      }
    })
  );

program
  .command('combine <files...>')
  .description('Combine files into one snapshot')
  .option('-o, --output <dir>', 'Output directory')
  .option('--header <text>', 'Text placed before the files')
  .option('--footer <text>', 'Text placed after the files')
  .action(
    withWorkspace((ws: Workspace, files: string[], options: { output?: string; header?: string; footer?: string }) => {
      const outputDir = options.output ? path.resolve(options.output) : path.join(ws.paths.dataDir, 'combined');
      const result = combineFiles(
        files.map(file => path.resolve(file)),
        outputDir,
        options.header,
        options.footer
      );
      if (!result.ok) {
        fail(result.error);
      } else {
        console.log(`Combined ${result.files} file(s) into ${result.path} (${result.totalTokens} tokens)`);
      }
    })
  );

program
  .command('snapshot')
  .description('Back up every monitored file now')
  .action(
    withWorkspace((ws: Workspace) => {
      const result = ws.createAutoBackup().forceBackup();
      if (!result.ok) {
        fail(result.error);
      } else {
        console.log(`Backed up ${result.files} file(s) to ${result.path}`);
      }
    })
  );

program
  .command('restore <snapshot> [files...]')
  .description('Restore files from a snapshot (all of them when none are given)')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(
    withWorkspace(async (ws: Workspace, snapshot: string, files: string[], options: { yes?: boolean }) => {
      const snapshotPath = path.resolve(snapshot);
      const contents = readSnapshotFile(snapshotPath);
      const targets = files.length > 0 ? files.map(file => path.resolve(file)) : Array.from(contents.keys());
      if (targets.length === 0) {
        console.log('Snapshot contains no files, nothing to restore.');
        return;
      }

      console.log(`Files to restore from ${snapshotPath}:`);
      targets.forEach(target => console.log(`  - ${target}`));
      const confirmed = await confirm(`Overwrite ${targets.length} file(s)?`, { assumeYes: options.yes });
      if (!confirmed) {
        console.log('Restore cancelled.');
        return;
      }

      const result = restoreFiles(contents, targets);
      const failed = result.failed.map(failure => failure.path);
      const noted = ws.journal.saveNote(formatRollbackNote(snapshotPath, targets, failed));
      if (!noted.ok) {
        console.log(kleur.yellow(`Warning: ${noted.error}`));
      }

      console.log(`Restored ${result.restored.length} of ${result.attempted} file(s)`);
      for (const failure of result.failed) {
        console.log(kleur.red(`  Failed: ${failure.path}: ${failure.error}`));
      }
      if (result.failed.length > 0) {
        process.exitCode = 1;
      }
    })
  );

program
  .command('diff <snapshot> <file>')
  .description('Show how a file differs from its snapshot copy')
  .action(
    withWorkspace((_ws: Workspace, snapshot: string, file: string) => {
      const target = path.resolve(file);
      const content = readSnapshotFile(path.resolve(snapshot)).get(target);
      if (content === undefined) {
        fail(`${target} is not in ${snapshot}`);
      } else {
        console.log(diffAgainstSnapshot(target, content));
      }
    })
  );

const waitForInterrupt = (): Promise<void> => new Promise(resolve => process.once('SIGINT', () => resolve()));

program
  .command('watch')
  .description('Monitor files, link changes to the active prompt and back up significant ones')
  .action(
    withWorkspace(async (ws: Workspace) => {
      const { settings } = ws;
      if (!settings.enabled) {
        fail('Auto-backup is disabled. Run `promptlink config enabled true` first.');
      }
      if (settings.monitorFolders.length === 0 && settings.monitorFiles.length === 0) {
        fail('Nothing to monitor. Set monitor_folders or monitor_files with `promptlink config`.');
      }

      const detector = ws.createDetector();
      const backup = ws.createAutoBackup(detector);
      const monitor = new ChangeMonitor({
        folders: settings.monitorFolders,
        files: settings.monitorFiles,
        shouldMonitor: filePath => detector.shouldMonitor(filePath),
        onBatch: paths => {
          backup.processBatch(paths);
        },
      });
      const reload = (): void => ws.reload();
      const pollers = [new RecordFilePoller(ws.primary, reload), new RecordFilePoller(ws.capture, reload)];

      monitor.start();
      pollers.forEach(poller => poller.start());
      const active = ws.session.active;
      console.log(active ? `Active prompt: ${active.id}` : kleur.yellow('No active prompt; changes will not be linked.'));
      console.log('Press Ctrl+C to stop.');

      await waitForInterrupt();
      await monitor.stop();
      await Promise.all(pollers.map(poller => poller.stop()));
      console.log('Monitoring stopped.');
    })
  );

program
  .command('serve')
  .description('Accept prompts from the browser and proxy capture channels')
  .option('-p, --port <number>', 'Port to listen on')
  .action(
    withWorkspace(async (ws: Workspace, options: { port?: string }) => {
      const port = options.port === undefined ? getServerPort() : parseInteger(options.port, 'port');
      const server = startServer({ db: ws.db, session: ws.session, relational: ws.relational }, port);
      const poller = new RecordFilePoller(ws.primary, () => ws.reload());
      poller.start();

      await waitForInterrupt();
      await poller.stop();
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
      console.log('Server stopped.');
    })
  );

program
  .command('config [key] [value]')
  .description('Show or change auto-backup settings')
  .action(
    withWorkspace((ws: Workspace, key: string | undefined, value: string | undefined) => {
      const file = settingsToFile(ws.settings);
      if (key === undefined) {
        console.log(JSON.stringify(file, null, 2));
        return;
      }
      if (value === undefined) {
        const entry = Object.entries(file).find(([name]) => name === key) ?? fail(`Unknown setting "${key}"`);
        console.log(JSON.stringify(entry[1]));
        return;
      }
      ws.updateSettings(applySettingUpdate(ws.settings, key, value));
      console.log(`Updated ${key}`);
    })
  );

program
  .command('notes [text]')
  .description('List journal notes, or add one')
  .option('-p, --project <name>', 'Project the note belongs to')
  .action(
    withWorkspace((ws: Workspace, text: string | undefined, options: { project?: string }) => {
      if (text === undefined) {
        const notes = ws.journal.loadNotes();
        if (notes.length === 0) {
          console.log('No notes yet.');
          return;
        }
        notes.forEach((note, index) => {
          console.log(kleur.bold(`[${index}] ${note.timestamp} (${note.project})`));
          console.log(note.note);
          console.log('');
        });
        return;
      }
      const result = ws.journal.saveNote(text, options.project);
      if (!result.ok) {
        fail(result.error);
      }
      console.log('Note saved.');
    })
  );

program
  .command('notes-delete <index>')
  .description('Delete a journal note by index')
  .action(
    withWorkspace((ws: Workspace, index: string) => {
      const deleted = ws.journal.deleteNote(parseInteger(index, 'index'));
      console.log(deleted ? `Deleted note from ${deleted.timestamp}` : `No note at index ${index}, nothing to delete.`);
    })
  );

program.parseAsync().catch(error => {
  console.error(kleur.red(`Error: ${describeError(error)}`));
  process.exitCode = 1;
});
