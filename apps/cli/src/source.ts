import type { PromptRecord, PromptSource } from '@promptlink/types';
import { isPromptSource } from './record';

type SourceSignals = Pick<PromptRecord, 'description' | 'llmUsed'>;

export interface SourceRule {
  name: string;
  matches(signals: SourceSignals): boolean;
  source: PromptSource;
}

const containsAny = (text: string, needles: string[]): boolean => {
  const lower = text.toLowerCase();
  return needles.some(needle => lower.includes(needle));
};

const isClaude = (signals: SourceSignals): boolean => signals.llmUsed === 'Claude';

/**
 * Provenance heuristics, evaluated in order; the first match wins. Several
 * rules can match the same record, so the order is part of the behaviour.
 */
export const SOURCE_RULES: readonly SourceRule[] = [
  {
    name: 'desktop auto-record marker',
    matches: ({ description }) => description.includes('Auto-recorded from Claude Desktop'),
    source: 'Claude Desktop',
  },
  {
    name: 'desktop mention',
    matches: ({ description }) => description.includes('Claude Desktop'),
    source: 'Claude Desktop',
  },
  {
    name: 'claude via proxy',
    matches: signals => isClaude(signals) && containsAny(signals.description, ['via', 'proxy']),
    source: 'Web Browser',
  },
  {
    name: 'chatgpt',
    matches: ({ llmUsed }) => llmUsed.includes('ChatGPT'),
    source: 'Web Browser',
  },
  {
    name: 'claude desktop keywords',
    matches: signals =>
      isClaude(signals) && containsAny(signals.description, ['mcp', 'auto-recorded', 'claude desktop']),
    source: 'Claude Desktop',
  },
  {
    name: 'claude web keywords',
    matches: signals =>
      isClaude(signals) &&
      containsAny(signals.description, ['web', 'proxy', 'browser', 'captured', 'via', 'claude.ai']),
    source: 'Web Browser',
  },
  {
    // Unlabelled Claude prompts are assumed to come from the desktop app.
    name: 'claude default',
    matches: isClaude,
    source: 'Claude Desktop',
  },
  {
    name: 'fallback',
    matches: () => true,
    source: 'Web Browser',
  },
];

export function inferSource(signals: SourceSignals): PromptSource {
  for (const rule of SOURCE_RULES) {
    if (rule.matches(signals)) {
      return rule.source;
    }
  }
  return 'Web Browser';
}

/**
 * Explicit label when the capture channel set one, otherwise inferred
 */
export function resolveSource(record: SourceSignals & { source?: string | null }): PromptSource {
  if (isPromptSource(record.source)) {
    return record.source;
  }
  return inferSource(record);
}
