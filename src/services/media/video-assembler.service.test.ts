import { describe, it, expect } from 'vitest';
import { buildAssemblyFilterGraph, escapeFilterPath } from './video-assembler.service';

describe('buildAssemblyFilterGraph', () => {
  const frame = { width: 1080, height: 1920 };
  const fit = (i: number) =>
    `[${i}:v]scale=1080:1920:force_original_aspect_ratio=decrease,pad=1080:1920:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=48[c${i}]`;

  it('concatenates clips and the end buffer into [out]', () => {
    expect(buildAssemblyFilterGraph({ clipCount: 2, withEndBuffer: true, frame, fps: 48 })).toBe(
      [fit(0), fit(1), fit(2), '[c0][c1][c2]concat=n=3:v=1:a=0[out]'].join(';')
    );
  });

  it('burns subtitles after the concat', () => {
    const graph = buildAssemblyFilterGraph({
      clipCount: 1,
      withEndBuffer: false,
      frame,
      fps: 48,
      subtitlePath: '/tmp/run/short.srt',
    });

    expect(graph.split(';')).toEqual([
      fit(0),
      '[c0]concat=n=1:v=1:a=0[vcat]',
      "[vcat]subtitles=filename=/tmp/run/short.srt:force_style='FontName=Arial,FontSize=22,PrimaryColour=&H00FFFFFF,OutlineColour=&H00000000,Outline=2,MarginV=60,Alignment=2'[out]",
    ]);
  });
});

describe('escapeFilterPath', () => {
  it('escapes drive colons and backslashes', () => {
    expect(escapeFilterPath('C:\\out\\a.srt')).toBe('C\\:/out/a.srt');
  });
});
