import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { createLogger } from './log';

const log = createLogger('tokens');

let encoder: Tiktoken | null | undefined;

function getEncoder(): Tiktoken | null {
  if (encoder === undefined) {
    try {
      encoder = getEncoding('cl100k_base');
    } catch (error) {
      log.warn('cl100k_base encoder unavailable, counting words instead', error);
      encoder = null;
    }
  }
  return encoder;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function countTokens(text: string): number {
  if (!text) {
    return 0;
  }
  const enc = getEncoder();
  if (!enc) {
    return countWords(text);
  }
  try {
    return enc.encode(text).length;
  } catch (error) {
    log.warn('Token encoding failed, counting words instead', error);
    return countWords(text);
  }
}
