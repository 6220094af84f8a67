import { logger } from '../../config/logger';
import type { SegmentTiming, TimedWord } from '../../types/alignment.types';
import { similarityRatio } from '../../utils/sequence-ratio';

// ===========================================================================
// Word Aligner
//
// Maps narration segments onto the word timings of a TTS clip. The TTS
// engine may rewrite contractions, punctuation or spacing, so each segment
// is located by an ordered list of strategies:
//
//   1. exact substring match after the cursor
//   2. fuzzy sliding-window match (similarity >= 0.6)
//   3. proportional timing estimate (always answers)
//
// A cursor into the transcript only moves forward, so a segment can never
// match text that an earlier segment already consumed.
// ===========================================================================

export const MIN_SEGMENT_DURATION = 0.1;
export const MAX_GAP_ABSORPTION = 0.3;
export const FUZZY_MATCH_THRESHOLD = 0.6;

// ----- Types -----

/** Transcript view shared by every strategy. */
export interface AlignmentTranscript {
  words: readonly TimedWord[];
  /** Words joined by single spaces */
  text: string;
  /** Character position -> word index (the joining space maps to the word before it) */
  charToWord: readonly number[];
  /** Last word's end time */
  totalDuration: number;
}

export interface AlignmentCursor {
  /** Next character position a segment may match from */
  position: number;
  /** End time of the previously aligned segment, 0 before the first */
  lastEndTime: number;
}

export interface StrategyMatch {
  timing: SegmentTiming;
  nextPosition: number;
}

export interface AlignmentStrategy {
  readonly name: string;
  locate(transcript: AlignmentTranscript, segment: string, cursor: AlignmentCursor): StrategyMatch | null;
}

// ----- Transcript helpers -----

export function buildTranscript(words: readonly TimedWord[]): AlignmentTranscript {
  const charToWord: number[] = [];
  words.forEach((word, index) => {
    for (let c = 0; c < word.text.length; c++) charToWord.push(index);
    if (index < words.length - 1) charToWord.push(index);
  });

  return {
    words,
    text: words.map((w) => w.text).join(' '),
    charToWord,
    totalDuration: words.length > 0 ? words[words.length - 1].endTime : 0,
  };
}

function withFloor(startTime: number, endTime: number): SegmentTiming {
  const duration = Math.max(endTime - startTime, MIN_SEGMENT_DURATION);
  return { startTime, endTime: startTime + duration, duration };
}

/**
 * Convert a matched character range into a timing. The segment's end absorbs
 * the silence before the next word, up to MAX_GAP_ABSORPTION.
 */
export function timingForCharacterRange(
  transcript: AlignmentTranscript,
  charStart: number,
  length: number
): SegmentTiming {
  const lastIndex = transcript.charToWord.length - 1;
  const charEnd = charStart + length - 1;
  const startWord = transcript.charToWord[Math.min(charStart, lastIndex)];
  const endWord = transcript.charToWord[Math.min(charEnd, lastIndex)];

  const startTime = transcript.words[startWord].startTime;
  let endTime = transcript.words[endWord].endTime;

  const next = transcript.words[endWord + 1];
  if (next) {
    const gap = next.startTime - endTime;
    endTime += Math.max(0, Math.min(gap, MAX_GAP_ABSORPTION));
  }

  return withFloor(startTime, endTime);
}

// ----- Strategies -----

export class ExactMatchStrategy implements AlignmentStrategy {
  readonly name = 'exact';

  locate(transcript: AlignmentTranscript, segment: string, cursor: AlignmentCursor): StrategyMatch | null {
    const index = transcript.text.indexOf(segment, cursor.position);
    if (index === -1) return null;
    return {
      timing: timingForCharacterRange(transcript, index, segment.length),
      nextPosition: index + segment.length,
    };
  }
}

export class FuzzyMatchStrategy implements AlignmentStrategy {
  readonly name = 'fuzzy';

  constructor(private readonly threshold: number = FUZZY_MATCH_THRESHOLD) {}

  locate(transcript: AlignmentTranscript, segment: string, cursor: AlignmentCursor): StrategyMatch | null {
    const index = this.findBestWindow(transcript.text, segment, cursor.position);
    if (index === -1) return null;
    return {
      timing: timingForCharacterRange(transcript, index, segment.length),
      nextPosition: index + segment.length,
    };
  }

  /**
   * Slide a window of the segment's length over the unsearched text with a
   * stride of a quarter segment, keeping the first best-scoring window.
   */
  findBestWindow(haystack: string, needle: string, start: number): number {
    const area = haystack.slice(start);
    if (!area || !needle) return -1;

    const needleLower = needle.toLowerCase();
    const step = Math.max(1, Math.floor(needle.length / 4));
    let bestRatio = 0;
    let bestPos = -1;

    for (let i = 0; i <= area.length - needle.length; i += step) {
      const ratio = similarityRatio(needleLower, area.slice(i, i + needle.length).toLowerCase());
      if (ratio > bestRatio) {
        bestRatio = ratio;
        bestPos = i;
      }
    }

    return bestRatio >= this.threshold ? start + bestPos : -1;
  }
}

export class ProportionalTimingStrategy implements AlignmentStrategy {
  readonly name = 'proportional';

  locate(transcript: AlignmentTranscript, segment: string, cursor: AlignmentCursor): StrategyMatch {
    logger.warn(`Could not align segment, using proportional timing: '${segment.slice(0, 50)}...'`);

    const startTime = cursor.lastEndTime;
    const remaining = Math.max(transcript.totalDuration - startTime, 0);
    const proportion = segment.length / Math.max(transcript.text.length - cursor.position, 1);

    return {
      timing: withFloor(startTime, startTime + remaining * proportion),
      nextPosition: cursor.position + segment.length,
    };
  }
}

// ----- Aligner -----

export class WordAligner {
  private readonly strategies: AlignmentStrategy[];

  constructor(strategies?: AlignmentStrategy[]) {
    this.strategies = strategies ?? [
      new ExactMatchStrategy(),
      new FuzzyMatchStrategy(),
      new ProportionalTimingStrategy(),
    ];
  }

  /**
   * Compute one timing per non-empty segment, in input order. Segments that
   * are empty after trimming produce no entry. Returns [] without words.
   */
  align(words: readonly TimedWord[], segments: readonly string[]): SegmentTiming[] {
    if (words.length === 0) return [];

    const transcript = buildTranscript(words);
    const cursor: AlignmentCursor = { position: 0, lastEndTime: 0 };
    const results: SegmentTiming[] = [];

    for (const raw of segments) {
      const segment = raw.trim();
      if (!segment) continue;

      const match = this.locate(transcript, segment, cursor);
      if (!match) {
        logger.warn(`No alignment strategy matched segment '${segment.slice(0, 50)}'`);
        continue;
      }

      results.push(match.timing);
      cursor.position = match.nextPosition;
      cursor.lastEndTime = match.timing.endTime;
    }

    return results;
  }

  private locate(transcript: AlignmentTranscript, segment: string, cursor: AlignmentCursor): StrategyMatch | null {
    for (const strategy of this.strategies) {
      const match = strategy.locate(transcript, segment, cursor);
      if (match) return match;
    }
    return null;
  }
}

export default new WordAligner();
