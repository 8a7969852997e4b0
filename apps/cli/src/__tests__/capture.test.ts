import { describe, expect, it } from 'vitest';
import { classifyUrl, extractPrompt } from '../capture';

describe('classifyUrl', () => {
  it('recognises the major providers', () => {
    expect(classifyUrl('https://api.openai.com/v1/chat/completions')?.provider).toBe('ChatGPT');
    expect(classifyUrl('https://chatgpt.com/backend-api/conversation')?.provider).toBe('ChatGPT');
    expect(classifyUrl('https://api.anthropic.com/v1/messages')?.provider).toBe('Claude');
    expect(classifyUrl('https://claude.ai/api/organizations/org-1/chat_conversations/c1/messages')?.provider).toBe(
      'Claude'
    );
    expect(classifyUrl('https://generativelanguage.googleapis.com/v1beta/models/gemini-pro:generateContent')?.provider).toBe(
      'Gemini'
    );
    expect(classifyUrl('https://api.perplexity.ai/chat/completions')?.provider).toBe('Perplexity');
  });

  it('names generic providers', () => {
    expect(classifyUrl('https://api.groq.com/openai/v1/chat/completions')).toEqual({ provider: 'Generic', llmName: 'Groq' });
    expect(classifyUrl('https://api.mistral.ai/v1/chat/completions')?.llmName).toBe('Mistral AI');
  });

  it('ignores everything else', () => {
    expect(classifyUrl('https://example.com/api')).toBeNull();
  });
});

describe('extractPrompt', () => {
  it('takes the last user message of a chat completion', () => {
    const captured = extractPrompt('https://api.openai.com/v1/chat/completions', {
      model: 'gpt-4o',
      temperature: 0.2,
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'first question' },
        { role: 'assistant', content: 'answer' },
        { role: 'user', content: 'second question' },
      ],
    });
    expect(captured).toEqual({
      promptText: 'second question',
      llmName: 'ChatGPT',
      source: 'Web Browser',
      modelName: 'gpt-4o',
      description: 'ChatGPT prompt via api.openai.com',
      url: 'https://api.openai.com/v1/chat/completions',
      metadata: { api_type: 'chat_completions', temperature: 0.2, messages_count: 4 },
    });
  });

  it('joins the text parts of multimodal content', () => {
    const captured = extractPrompt('https://api.openai.com/v1/chat/completions', {
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'describe' },
            { type: 'image_url', image_url: { url: 'data:' } },
            { type: 'text', text: 'this image' },
          ],
        },
      ],
    });
    expect(captured?.promptText).toBe('describe this image');
    expect(captured?.modelName).toBe('gpt-unknown');
  });

  it('reads the chatgpt.com web format', () => {
    const captured = extractPrompt('https://chatgpt.com/backend-api/conversation', {
      action: 'next',
      conversation_id: 'conv-1',
      messages: [{ author: { role: 'user' }, content: { content_type: 'text', parts: ['hello there'] } }],
    });
    expect(captured).toMatchObject({
      promptText: 'hello there',
      modelName: 'ChatGPT',
      conversationId: 'conv-1',
      metadata: { api_type: 'chatgpt_web', format: 'new' },
    });
  });

  it('reads legacy completions', () => {
    const captured = extractPrompt('https://api.openai.com/v1/completions', { prompt: 'complete me', max_tokens: 5 });
    expect(captured).toMatchObject({
      promptText: 'complete me',
      modelName: 'completions-unknown',
      description: 'ChatGPT completions prompt via api.openai.com',
      metadata: { api_type: 'completions', max_tokens: 5 },
    });
  });

  it('reads Anthropic messages and tags them as proxy captures', () => {
    const captured = extractPrompt('https://api.anthropic.com/v1/messages', {
      model: 'claude-3-haiku',
      max_tokens: 100,
      messages: [{ role: 'user', content: [{ type: 'text', text: 'plan the migration' }] }],
    });
    expect(captured).toMatchObject({
      promptText: 'plan the migration',
      llmName: 'Claude',
      source: 'proxy',
      description: 'Claude message via api.anthropic.com',
      metadata: { api_type: 'messages', max_tokens: 100, messages_count: 1 },
    });
    expect(captured).not.toHaveProperty('conversationId');
  });

  it('reads the claude.ai web format with direct content', () => {
    const captured = extractPrompt('https://claude.ai/api/organizations/o/chat_conversations/c/messages', {
      content: 'from the web app',
    });
    expect(captured?.promptText).toBe('from the web app');
    expect(captured?.description).toBe('Claude message via claude.ai');
  });

  it('reads Anthropic completions', () => {
    const captured = extractPrompt('https://api.anthropic.com/v1/complete', {
      prompt: '\n\nHuman: hi\n\nAssistant:',
      max_tokens_to_sample: 50,
    });
    expect(captured?.metadata).toEqual({ api_type: 'complete', max_tokens: 50 });
    expect(captured?.modelName).toBe('claude-unknown');
  });

  it('joins Gemini content parts', () => {
    const captured = extractPrompt('https://generativelanguage.googleapis.com/v1beta/models/gemini-pro:generateContent', {
      contents: [{ parts: [{ text: 'first part' }, { text: 'second part ' }] }],
    });
    expect(captured?.promptText).toBe('first part second part');
    expect(captured?.description).toBe('Gemini prompt via generativelanguage.googleapis.com');
  });

  it('reads Perplexity query bodies', () => {
    expect(extractPrompt('https://www.perplexity.ai/api/search', { query: 'what is new' })?.promptText).toBe(
      'what is new'
    );
  });

  it('reads generic inputs', () => {
    const captured = extractPrompt('https://api.deepinfra.com/v1/inference/some-model', { inputs: 'generate' });
    expect(captured).toMatchObject({
      promptText: 'generate',
      llmName: 'DeepInfra',
      modelName: 'unknown',
      description: 'DeepInfra prompt via api.deepinfra.com',
    });
  });

  it('returns null for unknown hosts, empty prompts and non-object bodies', () => {
    expect(extractPrompt('https://example.com/v1', { prompt: 'x' })).toBeNull();
    expect(extractPrompt('https://api.openai.com/v1/chat/completions', { messages: [{ role: 'user', content: '  ' }] })).toBeNull();
    expect(extractPrompt('https://api.openai.com/v1/chat/completions', 'prompt')).toBeNull();
    expect(extractPrompt('https://api.openai.com/v1/chat/completions', { messages: [{ role: 'system', content: 'x' }] })).toBeNull();
  });
});
