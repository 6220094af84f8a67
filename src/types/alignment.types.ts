/**
 * Timing data shared by TTS, the word aligner and every visual-planning step.
 * Times are seconds from the start of the audio clip they belong to.
 */

/** One spoken word as reported by the TTS engine. */
export interface TimedWord {
  text: string;
  startTime: number;
  endTime: number;
}

/** Interval of audio covered by one narration segment. */
export interface SegmentTiming {
  startTime: number;
  endTime: number;
  duration: number;
}

/** Character-level timing as returned by ElevenLabs `with-timestamps`. */
export interface CharacterAlignment {
  characters: string[];
  character_start_times_seconds: number[];
  character_end_times_seconds: number[];
}

/** Result of a TTS call: the saved audio file plus its word timings. */
export interface SynthesizedAudio {
  audioPath: string;
  words: TimedWord[];
}
