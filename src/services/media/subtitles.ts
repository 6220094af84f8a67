import { SUBTITLE_WORDS_PER_CUE } from '../../config/settings';
import type { TimedWord } from '../../types/alignment.types';

/** HH:MM:SS,mmm */
export function formatSrtTime(seconds: number): string {
  const totalMs = Math.floor(Math.max(0, seconds) * 1000);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(millis, 3)}`;
}

/** SRT document with one cue per `wordsPerCue` consecutive words. */
export function buildSrt(words: readonly TimedWord[], wordsPerCue = SUBTITLE_WORDS_PER_CUE): string {
  const cues: string[] = [];
  for (let i = 0; i < words.length; i += wordsPerCue) {
    const group = words.slice(i, i + wordsPerCue);
    const start = formatSrtTime(group[0].startTime);
    const end = formatSrtTime(group[group.length - 1].endTime);
    cues.push(`${cues.length + 1}\n${start} --> ${end}\n${group.map((w) => w.text).join(' ')}\n`);
  }
  return cues.join('\n');
}
