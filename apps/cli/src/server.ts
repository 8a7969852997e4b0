import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import { z } from 'zod';
import { extractPrompt } from './capture';
import type { PromptDatabase } from './database';
import { createLogger, describeError } from './log';
import { createPromptRecord, formatTimestamp, recordToEntry, sortNewestFirst } from './record';
import type { PromptSession } from './session';
import { resolveSource } from './source';
import type { RelationalPromptStore } from './store';

const log = createLogger('server');

export interface ServerDeps {
  db: PromptDatabase;
  session: PromptSession;
  /** When set, captured prompts go through the relational store */
  relational?: RelationalPromptStore | null;
}

const RecordPromptSchema = z.object({
  promptText: z.string().catch(''),
  llmName: z.string().min(1).catch('Unknown'),
  modelName: z.string().optional().catch(undefined),
  pageTitle: z.string().optional().catch(undefined),
});

const AssociateSchema = z.object({
  prompt_id: z.string().min(1),
  file_path: z.string().min(1),
});

const CaptureSchema = z.object({
  url: z.string().min(1),
  body: z.unknown(),
});

const readJson = async (c: Context): Promise<unknown> => {
  try {
    return await c.req.json();
  } catch (error) {
    log.debug(`Request body is not JSON: ${describeError(error)}`);
    return null;
  }
};

/**
 * HTTP boundary for browser and proxy capture channels
 */
export function createApp({ db, session, relational = null }: ServerDeps): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.onError((error, c) => {
    log.error(`${c.req.method} ${c.req.path} failed`, error);
    return c.json({ success: false, error: describeError(error) }, 500);
  });

  app.get('/ping', c =>
    c.json({ status: 'ok', timestamp: formatTimestamp(new Date()), prompts_recorded: db.size })
  );

  app.post('/record_prompt', async c => {
    const parsed = RecordPromptSchema.safeParse(await readJson(c));
    if (!parsed.success || !parsed.data.promptText.trim()) {
      return c.json({ success: false, error: 'Empty prompt text' }, 400);
    }
    const { promptText, llmName, modelName, pageTitle } = parsed.data;
    const llm = modelName ? `${llmName} (${modelName})` : llmName;
    const description = pageTitle ? `Prompt from ${llm} - ${pageTitle}` : `Prompt from ${llm}`;

    const record = session.setActive(createPromptRecord(promptText, llm, description, { source: 'Web Browser' }));
    log.info(`Recorded prompt from ${llm}`);
    return c.json({ success: true, prompt_id: record.id });
  });

  app.get('/prompts', c => {
    const prompts = sortNewestFirst([...db.prompts]).map(record => ({
      ...recordToEntry(record),
      source: resolveSource(record),
      file_changes: { ...record.fileChanges },
    }));
    return c.json({ success: true, prompts });
  });

  app.post('/associate_prompt', async c => {
    const parsed = AssociateSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ success: false, error: 'prompt_id and file_path are required' }, 400);
    }
    const { prompt_id: promptId, file_path: filePath } = parsed.data;
    const added = db.associateFiles(promptId, [filePath]);
    if (added === null) {
      return c.json({ success: false, error: `Prompt not found: ${promptId}` }, 404);
    }
    return c.json({ success: true, added: added > 0 });
  });

  app.post('/capture', async c => {
    const parsed = CaptureSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ success: false, error: 'url is required' }, 400);
    }
    const captured = extractPrompt(parsed.data.url, parsed.data.body);
    if (!captured) {
      return c.json({ success: true, captured: false });
    }

    let promptId: string;
    if (relational) {
      promptId = relational.addPrompt({
        promptText: captured.promptText,
        llmName: captured.llmName,
        source: captured.source,
        modelName: captured.modelName,
        description: captured.description,
        url: captured.url,
        conversationId: captured.conversationId,
        metadata: captured.metadata,
      });
      db.load();
      session.rebind();
    } else {
      const record = db.add(
        createPromptRecord(captured.promptText, captured.llmName, captured.description, {
          source: captured.source,
          metadata: captured.metadata,
        })
      );
      promptId = record.id;
    }

    log.info(`Captured ${captured.llmName} prompt (${captured.modelName})`);
    return c.json({ success: true, captured: true, prompt_id: promptId });
  });

  return app;
}

export function startServer(deps: ServerDeps, port: number): ServerType {
  const app = createApp(deps);
  return serve({ fetch: app.fetch, port }, info => {
    log.info(`Listening on http://localhost:${info.port}`);
  });
}
