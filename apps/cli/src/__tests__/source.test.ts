import { describe, expect, it } from 'vitest';
import { inferSource, resolveSource, SOURCE_RULES } from '../source';

describe('inferSource', () => {
  it('recognises the desktop auto-record marker', () => {
    expect(inferSource({ llmUsed: 'Claude', description: 'Auto-recorded from Claude Desktop' })).toBe('Claude Desktop');
  });

  it('treats Claude prompts seen via a proxy as browser captures', () => {
    expect(inferSource({ llmUsed: 'Claude', description: 'Claude message via claude.ai' })).toBe('Web Browser');
  });

  it('assumes unlabelled Claude prompts come from the desktop app', () => {
    expect(inferSource({ llmUsed: 'Claude', description: '' })).toBe('Claude Desktop');
  });

  it('labels ChatGPT prompts as browser captures', () => {
    expect(inferSource({ llmUsed: 'ChatGPT (gpt-4o)', description: 'mcp' })).toBe('Web Browser');
  });

  it('matches desktop keywords case-insensitively', () => {
    expect(inferSource({ llmUsed: 'Claude', description: 'Sent through MCP tool' })).toBe('Claude Desktop');
  });

  it('falls back to the browser for anything else', () => {
    expect(inferSource({ llmUsed: 'Gemini', description: '' })).toBe('Web Browser');
  });

  it('evaluates rules in a fixed order ending with a catch-all', () => {
    expect(SOURCE_RULES[0].name).toBe('desktop auto-record marker');
    expect(SOURCE_RULES[SOURCE_RULES.length - 1].matches({ llmUsed: '', description: '' })).toBe(true);
  });
});

describe('resolveSource', () => {
  it('keeps an explicit label', () => {
    expect(resolveSource({ llmUsed: 'Claude', description: '', source: 'Web Browser' })).toBe('Web Browser');
  });

  it('infers when the stored source is not a label', () => {
    expect(resolveSource({ llmUsed: 'Claude', description: '', source: 'proxy' })).toBe('Claude Desktop');
  });
});
