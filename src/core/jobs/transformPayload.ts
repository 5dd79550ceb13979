import type { JobPayload, ProcessedResult } from "./Job";

const countWords = (text: string): number => text.split(/\s+/).filter((word) => word.length > 0).length;

// Counts code points, so "İ" or an emoji is one character.
const countChars = (text: string): number => Array.from(text).length;

/**
 * Fixed transform applied to every submitted payload:
 * - strings get word/char counts and an upper-cased copy
 * - anything else reports zero counts and passes through unchanged
 */
export const transformPayload = (payload: JobPayload, processedAt: Date): ProcessedResult => {
  if (typeof payload === "string") {
    return {
      original_data: payload,
      processed_at: processedAt.toISOString(),
      word_count: countWords(payload),
      char_count: countChars(payload),
      uppercase: payload.toUpperCase()
    };
  }

  return {
    original_data: payload,
    processed_at: processedAt.toISOString(),
    word_count: 0,
    char_count: 0,
    uppercase: payload
  };
};
