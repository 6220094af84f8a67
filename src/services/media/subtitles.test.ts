import { describe, it, expect } from 'vitest';
import { buildSrt, formatSrtTime } from './subtitles';

describe('formatSrtTime', () => {
  it('formats hours, minutes, seconds and milliseconds', () => {
    expect(formatSrtTime(0)).toBe('00:00:00,000');
    expect(formatSrtTime(3725.25)).toBe('01:02:05,250');
  });
});

describe('buildSrt', () => {
  it('groups words into numbered cues', () => {
    const words = [
      { text: 'Tides', startTime: 0, endTime: 0.5 },
      { text: 'rise', startTime: 0.5, endTime: 0.75 },
      { text: 'twice', startTime: 0.75, endTime: 1.25 },
      { text: 'a', startTime: 1.25, endTime: 1.5 },
      { text: 'day.', startTime: 1.5, endTime: 2 },
    ];

    expect(buildSrt(words, 4)).toBe(
      '1\n00:00:00,000 --> 00:00:01,500\nTides rise twice a\n\n2\n00:00:01,500 --> 00:00:02,000\nday.\n'
    );
  });

  it('returns an empty document without words', () => {
    expect(buildSrt([])).toBe('');
  });
});
