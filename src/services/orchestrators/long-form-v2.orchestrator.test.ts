import { describe, it, expect } from 'vitest';
import { LongFormV2Orchestrator, sectionBeats } from './long-form-v2.orchestrator';
import { ScriptWriterV2Service } from '../script/script-writer-v2.service';
import type { Researcher } from '../research/research.service';
import { FakeStructuredGenerator, type FakeReply } from '../../test/fake-llm';
import { MemoryCheckpoints, fakeMedia } from '../../test/fake-media';

const OUTLINE = {
  thesis: 'Sleep is the cheapest performance boost',
  sections: [
    { sectionName: 'The cost of short nights', sectionPurpose: 'Set up the problem' },
    { sectionName: 'A better routine', sectionPurpose: 'Offer the fix', transitionFromPrevious: 'So what helps?' },
  ],
};

function outlineReview(passed: boolean) {
  return {
    structureScore: 7,
    varietyScore: 7,
    retentionScore: passed ? 8 : 4,
    depthScore: 7,
    pacingScore: 7,
    revisionNotes: passed ? [] : ['Add a story section'],
    passed,
  };
}

function field(payload: unknown, key: string): unknown {
  return typeof payload === 'object' && payload !== null ? Object.entries(payload).find(([k]) => k === key)?.[1] : undefined;
}

const noResearch: Researcher = {
  research: async () => {
    throw new Error('research is disabled in these runs');
  },
};

function setup(replies: { OutlineReview?: FakeReply | unknown[] } = {}) {
  const llm = new FakeStructuredGenerator({
    VideoOutlineV2: [OUTLINE],
    OutlineReview: [outlineReview(true)],
    SectionScriptV2: (_payload, call) => ({
      sectionScript: `Section ${call + 1} script.`,
      ttsScript: `[calm] Section ${call + 1} script.`,
    }),
    ConnectorPass: [{ smoothedSections: ['Smoothed one.', 'Smoothed two.'] }],
    SectionSegments: (payload) => ({ segments: [String(field(payload, 'sectionScript'))] }),
    StyleGuide: [
      {
        colorPalette: ['#223344'],
        lightingDirection: 'low and warm',
        compositionRules: ['centered subject'],
        styleKeywords: ['calm'],
      },
    ],
    Storyboard: [{ storyboard: [{ shots: [{ imagePrompt: 'Bedroom at night', durationMs: 4000 }] }] }],
    ...replies,
  });
  const media = fakeMedia([4]);
  const checkpoints = new MemoryCheckpoints();
  const orchestrator = new LongFormV2Orchestrator(
    { ...media, writer: new ScriptWriterV2Service(llm), researcher: noResearch },
    checkpoints.options()
  );
  return { llm, media, checkpoints, orchestrator };
}

describe('sectionBeats', () => {
  it('builds neutral beats with aligned durations', () => {
    const text = 'A very long segment of narration that keeps going well past sixty characters in total';
    expect(sectionBeats([text], [{ startTime: 0, endTime: 5.5, duration: 5.5 }])).toEqual([
      {
        rawText: text,
        visualIntent: `B-roll for: ${text.slice(0, 60)}`,
        beatType: 'setup',
        energyLevel: 5,
        durationMs: 5500,
      },
    ]);
  });
});

describe('LongFormV2Orchestrator', () => {
  it('writes sections in parallel, smooths them, and renders every section', async () => {
    const { llm, media, checkpoints, orchestrator } = setup();

    const state = await orchestrator.run({ topic: 'Sleep', enableResearch: false });

    expect(checkpoints.labels).toEqual([
      'lf2_after_outline',
      'lf2_after_outline_review',
      'lf2_after_scripts',
      'lf2_after_audio',
      'lf2_after_storyboards',
      'lf2_after_images',
      'lf2_after_clips',
      'lf2_after_section_assembly',
      'lf2_complete',
    ]);

    const scriptCalls = llm.callsFor('SectionScriptV2');
    expect(scriptCalls.map((c) => field(c.payload, 'cumulativeScript'))).toEqual(['', '']);
    expect(field(scriptCalls[0].payload, 'precedingSectionPlan')).toBeNull();
    expect(scriptCalls[1].payload).toMatchObject({ precedingSectionPlan: { sectionName: 'The cost of short nights' } });
    expect(llm.callsFor('ConnectorPass')[0].payload).toEqual({
      sections: [
        { sectionName: 'The cost of short nights', sectionScript: 'Section 1 script.', transitionFromPrevious: '' },
        { sectionName: 'A better routine', sectionScript: 'Section 2 script.', transitionFromPrevious: 'So what helps?' },
      ],
    });

    expect(state.fullScript).toBe('Smoothed one. Smoothed two.');
    // narration keeps the TTS track; segmentation follows the smoothed text
    expect(media.tts.requests.map((r) => r.text).sort()).toEqual(['[calm] Section 1 script.', '[calm] Section 2 script.']);
    expect(state.sections.map((s) => s.segments)).toEqual([['Smoothed one.'], ['Smoothed two.']]);

    expect(llm.callsFor('Storyboard')[0].payload).toMatchObject({
      beats: [{ visualIntent: 'B-roll for: Smoothed one.', durationMs: 4000 }],
    });
    expect(media.renderer.assembled.map((a) => a.addEndBuffer)).toEqual([false, false]);
    expect(media.renderer.concatenated[0].sectionPaths).toEqual(state.sections.map((s) => s.sectionVideoPath));
    expect(media.history.entries[0]).toMatchObject({
      videoType: 'long_form_v2',
      script: 'Smoothed one. Smoothed two.',
      goal: 'Sleep is the cheapest performance boost',
      orientation: 'landscape',
    });
  });

  it('passes the narration so far to each section when writing sequentially', async () => {
    const { llm, orchestrator } = setup();

    const state = await orchestrator.run({ topic: 'Sleep', enableResearch: false, scriptStrategy: 'sequential' });

    const scriptCalls = llm.callsFor('SectionScriptV2');
    expect(scriptCalls.map((c) => field(c.payload, 'cumulativeScript'))).toEqual(['', 'Section 1 script. ']);
    expect(llm.callsFor('ConnectorPass')).toHaveLength(0);
    expect(state.fullScript).toBe('Section 1 script. Section 2 script.');
  });

  it('regenerates the outline with the review notes when the review fails', async () => {
    const { llm, checkpoints, orchestrator } = setup({
      OutlineReview: [outlineReview(false), outlineReview(true)],
    });

    const state = await orchestrator.run({ topic: 'Sleep', enableResearch: false });

    expect(state.outlineRevisionCount).toBe(1);
    expect(checkpoints.labels.slice(0, 3)).toEqual([
      'lf2_after_outline',
      'lf2_after_outline_review',
      'lf2_outline_revision_1',
    ]);
    expect(llm.callsFor('VideoOutlineV2')[1].payload).toMatchObject({
      additionalInstructions: 'REVISION NOTES FROM PREVIOUS ATTEMPT:\n- Add a story section',
    });
  });
});
