/**
 * Derive word-level timings from ElevenLabs character-level alignment.
 */

import type { CharacterAlignment, TimedWord } from '../types/alignment.types';

/**
 * Group non-space characters into words. A word starts at its first
 * character's start time and ends at its last character's end time.
 */
export function extractWordTimings(alignment: CharacterAlignment | null | undefined): TimedWord[] {
  if (!alignment?.characters?.length) return [];

  const chars = alignment.characters;
  const starts = alignment.character_start_times_seconds;
  const ends = alignment.character_end_times_seconds;

  const words: TimedWord[] = [];
  let current = '';
  let wordStart: number | null = null;
  let wordEnd = 0;

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (/^\s$/.test(char)) {
      if (current && wordStart !== null) {
        words.push({ text: current, startTime: wordStart, endTime: wordEnd });
      }
      current = '';
      wordStart = null;
      continue;
    }

    if (wordStart === null) {
      wordStart = starts[i] ?? wordEnd;
    }
    wordEnd = ends[i] ?? starts[i] ?? wordEnd;
    current += char;
  }

  if (current && wordStart !== null) {
    words.push({ text: current, startTime: wordStart, endTime: wordEnd });
  }

  return words;
}
