import { createLogger } from './log';

const log = createLogger('capture');

export type LlmProvider = 'ChatGPT' | 'Claude' | 'Gemini' | 'Perplexity' | 'Generic';

export interface UrlClassification {
  provider: LlmProvider;
  llmName: string;
}

/**
 * A prompt pulled out of an intercepted LLM request body
 */
export interface CapturedPrompt {
  promptText: string;
  llmName: string;
  /** Stored verbatim in the relational row */
  source: string;
  modelName: string;
  description: string;
  url: string;
  conversationId?: string;
  metadata: Record<string, unknown>;
}

const PROVIDER_PATTERNS: Array<{ provider: Exclude<LlmProvider, 'Generic'>; patterns: RegExp[] }> = [
  {
    provider: 'ChatGPT',
    patterns: [
      /api\.openai\.com\/v1\/chat\/completions/,
      /api\.openai\.com\/v1\/engines\/.*\/completions/,
      /api\.openai\.com\/v1\/completions/,
      /chat\.openai\.com\/backend-api\/conversation/,
      /chatgpt\.com\/backend-api\/conversation/,
    ],
  },
  {
    provider: 'Claude',
    patterns: [/api\.anthropic\.com\/v1\/messages/, /api\.anthropic\.com\/v1\/complete/, /claude\.ai\/api\/.*?\/messages/],
  },
  {
    provider: 'Gemini',
    patterns: [
      /generativelanguage\.googleapis\.com/,
      /gemini\.google\.com\/api/,
      /generativeai\.google\.com\/api/,
      /generativeai\.googleapis\.com/,
    ],
  },
  {
    provider: 'Perplexity',
    patterns: [/api\.perplexity\.ai/, /perplexity\.ai\/api/],
  },
];

const GENERIC_PROVIDERS: Array<{ pattern: RegExp; llmName: string }> = [
  { pattern: /api\.mistral\.ai/, llmName: 'Mistral AI' },
  { pattern: /api\.cohere\.ai/, llmName: 'Cohere' },
  { pattern: /api\.together\.xyz/, llmName: 'Together AI' },
  { pattern: /api\.groq\.com/, llmName: 'Groq' },
  { pattern: /api\.deepinfra\.com/, llmName: 'DeepInfra' },
];

export function classifyUrl(url: string): UrlClassification | null {
  for (const { provider, patterns } of PROVIDER_PATTERNS) {
    if (patterns.some(pattern => pattern.test(url))) {
      return { provider, llmName: provider };
    }
  }
  const generic = GENERIC_PROVIDERS.find(entry => entry.pattern.test(url));
  return generic ? { provider: 'Generic', llmName: generic.llmName } : null;
}

type Body = Record<string, unknown>;

const isRecord = (value: unknown): value is Body =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringField = (body: Body, key: string): string | undefined => {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
};

/**
 * Plain string content, or the text parts of multimodal content joined by
 * spaces
 */
function contentText(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .filter(isRecord)
      .filter(part => part.type === 'text')
      .map(part => (typeof part.text === 'string' ? part.text : ''))
      .join(' ');
  }
  return '';
}

function lastUserMessage(messages: unknown): Body | null {
  if (!Array.isArray(messages)) {
    return null;
  }
  const users = messages.filter(isRecord).filter(message => message.role === 'user');
  return users.length > 0 ? users[users.length - 1] : null;
}

const compact = (metadata: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(metadata).filter(([, value]) => value !== undefined));

type Extracted = Omit<CapturedPrompt, 'url' | 'llmName' | 'source'>;

function extractChatGpt(url: string, body: Body, origin: string): Extracted | null {
  if (/(chatgpt\.com|chat\.openai\.com)\/backend-api\/conversation/.test(url) && 'action' in body) {
    const messages = Array.isArray(body.messages) ? body.messages.filter(isRecord) : [];
    const users = messages.filter(message => isRecord(message.author) && message.author.role === 'user');
    const last = users.length > 0 ? users[users.length - 1] : null;
    if (last && isRecord(last.content) && last.content.content_type === 'text' && Array.isArray(last.content.parts)) {
      const first: unknown = last.content.parts[0];
      if (typeof first === 'string') {
        return {
          promptText: first,
          modelName: stringField(body, 'model') ?? 'ChatGPT',
          description: `ChatGPT prompt via ${origin}`,
          conversationId: stringField(body, 'conversation_id'),
          metadata: { api_type: 'chatgpt_web', format: 'new' },
        };
      }
    }
    log.debug(`Unrecognized chatgpt.com format: ${JSON.stringify(body).slice(0, 200)}`);
  }

  if ('messages' in body) {
    const last = lastUserMessage(body.messages);
    if (!last) {
      return null;
    }
    return {
      promptText: contentText(last.content),
      modelName: stringField(body, 'model') ?? 'gpt-unknown',
      description: `ChatGPT prompt via ${origin}`,
      conversationId: stringField(body, 'conversation_id'),
      metadata: compact({
        api_type: 'chat_completions',
        temperature: body.temperature,
        max_tokens: body.max_tokens,
        messages_count: Array.isArray(body.messages) ? body.messages.length : 0,
      }),
    };
  }

  if ('prompt' in body) {
    return {
      promptText: contentText(body.prompt),
      modelName: stringField(body, 'model') ?? 'completions-unknown',
      description: `ChatGPT completions prompt via ${origin}`,
      metadata: compact({ api_type: 'completions', temperature: body.temperature, max_tokens: body.max_tokens }),
    };
  }
  return null;
}

function extractClaude(body: Body, origin: string): Extracted | null {
  if ('prompt' in body) {
    return {
      promptText: contentText(body.prompt),
      modelName: stringField(body, 'model') ?? 'claude-unknown',
      description: `Claude prompt via ${origin}`,
      metadata: compact({ api_type: 'complete', temperature: body.temperature, max_tokens: body.max_tokens_to_sample }),
    };
  }

  if (!('content' in body) && !('messages' in body)) {
    return null;
  }
  const messages = Array.isArray(body.messages) ? body.messages : [];
  let promptText: string;
  if (messages.length === 0 && 'content' in body) {
    promptText = contentText(body.content);
  } else {
    const last = lastUserMessage(messages);
    if (!last) {
      return null;
    }
    promptText = contentText(last.content);
  }

  return {
    promptText,
    modelName: stringField(body, 'model') ?? 'claude-unknown',
    description: `Claude message via ${origin}`,
    conversationId: stringField(body, 'conversation_id'),
    metadata: compact({
      api_type: 'messages',
      temperature: body.temperature,
      max_tokens: body.max_tokens,
      messages_count: messages.length > 0 ? messages.length : 1,
    }),
  };
}

function extractGemini(body: Body, origin: string): Extracted | null {
  if (!Array.isArray(body.contents)) {
    return null;
  }
  const texts: string[] = [];
  for (const content of body.contents.filter(isRecord)) {
    const parts = Array.isArray(content.parts) ? content.parts.filter(isRecord) : [];
    for (const part of parts) {
      if (typeof part.text === 'string') {
        texts.push(part.text);
      }
    }
  }
  return {
    promptText: texts.join(' ').trim(),
    modelName: stringField(body, 'model') ?? 'gemini-unknown',
    description: `Gemini prompt via ${origin}`,
    metadata: compact({ temperature: body.temperature, max_tokens: body.maxOutputTokens }),
  };
}

function extractPerplexity(body: Body, origin: string): Extracted | null {
  let promptText: string;
  if ('text' in body) {
    promptText = contentText(body.text);
  } else if ('prompt' in body) {
    promptText = contentText(body.prompt);
  } else if ('query' in body) {
    promptText = contentText(body.query);
  } else if ('messages' in body || 'message' in body) {
    const messages = Array.isArray(body.messages) ? body.messages : isRecord(body.message) ? [body.message] : [];
    const last = lastUserMessage(messages);
    if (!last) {
      return null;
    }
    promptText = contentText(last.content);
  } else {
    return null;
  }

  return {
    promptText,
    modelName: stringField(body, 'model') ?? 'perplexity-unknown',
    description: `Perplexity prompt via ${origin}`,
    metadata: {},
  };
}

function extractGeneric(body: Body, origin: string, llmName: string): Extracted | null {
  let promptText = '';
  if ('prompt' in body) {
    promptText = contentText(body.prompt);
  } else if ('messages' in body) {
    const last = lastUserMessage(body.messages);
    promptText = last ? contentText(last.content) : '';
  } else if ('inputs' in body) {
    promptText = contentText(body.inputs);
  }

  return {
    promptText,
    modelName: stringField(body, 'model') ?? 'unknown',
    description: `${llmName} prompt via ${origin}`,
    metadata: {},
  };
}

/**
 * Pull the user's prompt out of a request to a known LLM endpoint. Returns
 * null for unknown endpoints, unrecognised bodies and empty prompts.
 */
export function extractPrompt(url: string, body: unknown): CapturedPrompt | null {
  const classification = classifyUrl(url);
  if (!classification || !isRecord(body)) {
    return null;
  }

  let origin: string;
  try {
    origin = new URL(url).host;
  } catch {
    log.debug(`Ignoring capture with an invalid URL: ${url}`);
    return null;
  }

  let extracted: Extracted | null;
  switch (classification.provider) {
    case 'ChatGPT':
      extracted = extractChatGpt(url, body, origin);
      break;
    case 'Claude':
      extracted = extractClaude(body, origin);
      break;
    case 'Gemini':
      extracted = extractGemini(body, origin);
      break;
    case 'Perplexity':
      extracted = extractPerplexity(body, origin);
      break;
    case 'Generic':
      extracted = extractGeneric(body, origin, classification.llmName);
      break;
  }

  if (!extracted || !extracted.promptText.trim()) {
    return null;
  }

  const captured: CapturedPrompt = {
    ...extracted,
    llmName: classification.llmName,
    source: classification.provider === 'ChatGPT' ? 'Web Browser' : 'proxy',
    url,
  };
  if (captured.conversationId === undefined) {
    delete captured.conversationId;
  }
  return captured;
}
