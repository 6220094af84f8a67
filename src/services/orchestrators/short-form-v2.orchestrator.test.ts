import { describe, it, expect, vi } from 'vitest';
import { ShortFormV2Orchestrator, imagesWithPrompts } from './short-form-v2.orchestrator';
import { ScriptWriterV2Service } from '../script/script-writer-v2.service';
import { emptyVisualPlan } from '../planning/visual-planner';
import type { Researcher, ResearchRequest } from '../research/research.service';
import { FakeStructuredGenerator, type FakeReply } from '../../test/fake-llm';
import { MemoryCheckpoints, fakeMedia } from '../../test/fake-media';

function fullScript(version: string) {
  return {
    goal: 'Make budgeting feel easy',
    hook: 'Where did your paycheck go?',
    beats: [
      {
        rawText: `Where did your paycheck go? (${version})`,
        ttsText: `[curious] Where did your paycheck go? (${version})`,
        visualIntent: 'Empty wallet on a desk',
        beatType: 'hook',
        energyLevel: 8,
      },
      {
        rawText: 'Track three numbers each week.',
        ttsText: 'Track three numbers each week.',
        visualIntent: 'Notebook with three circled figures',
      },
    ],
    cta: 'Follow for more money tips',
  };
}

function qualityReport(passed: boolean) {
  return {
    hookScore: passed ? 8 : 5,
    clarityScore: 8,
    engagementScore: 7,
    ctaScore: 7,
    pacingScore: 8,
    revisionNotes: passed ? [] : ['Sharpen the hook'],
    passed,
  };
}

const STYLE_GUIDE = {
  colorPalette: ['#1f3b4d', '#f2c14e'],
  lightingDirection: 'soft window light',
  compositionRules: ['rule of thirds'],
  styleKeywords: ['clean', 'warm'],
};

const STORYBOARD = {
  storyboard: [
    { shots: [{ imagePrompt: 'Empty wallet on an oak desk', durationMs: 4000 }] },
    {
      shots: [
        { imagePrompt: 'Hand writing in a notebook', durationMs: 3000 },
        { imagePrompt: 'Three circled figures', durationMs: 4000 },
      ],
    },
  ],
};

function setup(replies: { FullScript?: FakeReply | unknown[]; QualityReport?: FakeReply | unknown[] } = {}) {
  const llm = new FakeStructuredGenerator({
    FullScript: [fullScript('first')],
    QualityReport: [qualityReport(true)],
    StyleGuide: [STYLE_GUIDE],
    Storyboard: [STORYBOARD],
    ...replies,
  });
  const media = fakeMedia([4, 7]);
  const researcher: Researcher = {
    research: vi.fn(async (_request: ResearchRequest) => ({
      researchBrief: {
        keyFacts: ['Most people underestimate small purchases'],
        statistics: [],
        expertPerspectives: [],
        counterarguments: [],
        knowledgeGaps: [],
        angleRecommendation: 'Focus on weekly habits',
      },
      trendContext: { workingHooks: [], saturatedAngles: [], contentGaps: [] },
    })),
  };
  const checkpoints = new MemoryCheckpoints();
  const orchestrator = new ShortFormV2Orchestrator(
    { ...media, writer: new ScriptWriterV2Service(llm), researcher },
    checkpoints.options()
  );
  return { llm, media, researcher, checkpoints, orchestrator };
}

describe('imagesWithPrompts', () => {
  it('pairs each image with the description it came from', () => {
    const first = emptyVisualPlan(0, 2, 3);
    first.imageDescriptions = [
      { description: 'Harbor at dusk', usesLogo: false },
      { description: 'Fishing boats', usesLogo: false },
    ];
    first.imagePaths = ['/images/a.png', '/images/b.png'];
    const second = emptyVisualPlan(1, 1, 3);
    second.imagePaths = ['/images/c.png'];

    expect(imagesWithPrompts([first, second])).toEqual({
      paths: ['/images/a.png', '/images/b.png'],
      prompts: ['Harbor at dusk', 'Fishing boats'],
    });
  });
});

describe('ShortFormV2Orchestrator', () => {
  it('narrates the TTS track and plans one image per storyboard shot', async () => {
    const { llm, media, checkpoints, orchestrator } = setup();
    const onProgress = vi.fn();

    const state = await orchestrator.run({ topic: 'Budgeting', enableResearch: false }, { onProgress });

    // image files do not exist on disk, so visual QA is skipped without failing the run
    expect(checkpoints.labels).toEqual([
      'sf2_after_script',
      'sf2_after_quality_gate',
      'sf2_after_audio',
      'sf2_after_storyboard',
      'sf2_after_images',
      'sf2_after_clips',
      'sf2_complete',
    ]);
    expect(onProgress).toHaveBeenCalledWith('Skipping research (disabled).', 0.08);
    expect(onProgress).toHaveBeenCalledWith('Visual QA skipped (non-fatal error).', 0.68);

    expect(media.tts.requests[0].text).toBe(
      '[curious] Where did your paycheck go? (first) Track three numbers each week.'
    );
    expect(llm.callsFor('Storyboard')[0].payload).toMatchObject({
      beats: [
        { rawText: 'Where did your paycheck go? (first)', beatType: 'hook', energyLevel: 8, durationMs: 4000 },
        { rawText: 'Track three numbers each week.', beatType: 'setup', energyLevel: 5, durationMs: 7000 },
      ],
      styleGuide: STYLE_GUIDE,
    });

    expect(state.visualPlans.map((p) => p.numImages)).toEqual([1, 2]);
    expect(media.images.prompts.map((p) => p.prompt).sort()).toEqual([
      'Empty wallet on an oak desk',
      'Hand writing in a notebook',
      'Three circled figures',
    ]);
    expect(media.renderer.clips.map((c) => c.durations)).toEqual([[4], [3, 4]]);
    expect(media.renderer.clips.map((c) => c.motions)).toEqual([['zoom_in'], ['zoom_out', 'zoom_in']]);
    expect(media.renderer.assembled[0].outputPath).toMatch(/short_form_v2_budgeting_\d{8}_\d{6}_[0-9a-f-]{36}\.mp4$/);

    expect(media.history.entries[0]).toMatchObject({
      videoType: 'short_form_v2',
      script: 'Where did your paycheck go? (first) Track three numbers each week.',
      goal: 'Make budgeting feel easy',
    });
  });

  it('revises the script until it passes the quality gate', async () => {
    const { llm, media, checkpoints, orchestrator } = setup({
      FullScript: [fullScript('first'), fullScript('second')],
      QualityReport: [qualityReport(false), qualityReport(true)],
    });

    const state = await orchestrator.run({ topic: 'Budgeting', enableResearch: false });

    expect(state.scriptRevisionCount).toBe(1);
    expect(checkpoints.labels.slice(0, 3)).toEqual(['sf2_after_script', 'sf2_after_quality_gate', 'sf2_revision_1']);
    expect(llm.callsFor('FullScript')[1].payload).toMatchObject({ revisionNotes: ['Sharpen the hook'] });
    expect(media.tts.requests[0].text).toBe(
      '[curious] Where did your paycheck go? (second) Track three numbers each week.'
    );
  });

  it('stops revising after the maximum number of attempts', async () => {
    const { llm, checkpoints, orchestrator } = setup({ QualityReport: [qualityReport(false)] });

    const state = await orchestrator.run({ topic: 'Budgeting', enableResearch: false });

    expect(state.scriptRevisionCount).toBe(2);
    expect(state.qualityReport?.passed).toBe(false);
    expect(llm.callsFor('FullScript')).toHaveLength(3);
    expect(checkpoints.labels.slice(2, 4)).toEqual(['sf2_revision_1', 'sf2_revision_2']);
  });

  it('researches the topic first when research is on', async () => {
    const { llm, researcher, checkpoints, orchestrator } = setup();

    const state = await orchestrator.run({ topic: 'Budgeting', referenceUrls: 'https://example.com/budget' });

    expect(researcher.research).toHaveBeenCalledWith(
      expect.objectContaining({ topic: 'Budgeting', referenceUrls: 'https://example.com/budget', provider: 'google' }),
      expect.anything()
    );
    expect(checkpoints.labels[0]).toBe('sf2_after_research');
    expect(state.researchBrief?.angleRecommendation).toBe('Focus on weekly habits');
    expect(llm.callsFor('FullScript')[0].payload).toMatchObject({
      researchBrief: { keyFacts: ['Most people underestimate small purchases'] },
    });
  });
});
