import { MAX_OUTLINE_REVISIONS } from '../../config/settings';
import type { SegmentTiming } from '../../types/alignment.types';
import {
  createLongFormV2State,
  createSectionV2State,
  type LongFormV2State,
  type ScriptStrategy,
  type VideoV2ConfigInput,
} from '../../types/v2.types';
import { slugify } from '../../utils/file-naming';
import { finalVideoPath, sectionVideoPath } from '../media/video-assembler.service';
import { buildVisualPlansFromStoryboard } from '../planning/visual-planner';
import { beatDurationsMs, type StoryboardBeat } from '../script/script-writer-v2.service';
import { runResearchStage } from './research-stage';
import { CHECKPOINT_DIRS, startRun, type OrchestratorOptions, type RunContext } from './run-context';
import { createSectionWriters, type SectionScriptWriter } from './section-writers';
import { defaultVideoV2Dependencies, type VideoV2Dependencies } from './short-form-v2.orchestrator';
import { animatePlans, generatePlanClips, generatePlanImages } from './visual-stages';

/** Storyboard beats for plain section segments: generic intent, neutral energy. */
export function sectionBeats(segments: readonly string[], timings: readonly SegmentTiming[]): StoryboardBeat[] {
  const durations = beatDurationsMs(segments.length, timings);
  return segments.map((text, i) => ({
    rawText: text,
    visualIntent: `B-roll for: ${text.slice(0, 60)}`,
    beatType: 'setup',
    energyLevel: 5,
    durationMs: durations[i],
  }));
}

// ===========================================================================
// Long-form V2
//
// Outline with a review gate, section scripts (parallel + connector pass or
// sequential baton), then every media phase fanned out across sections and
// one final concatenation.
// ===========================================================================

export class LongFormV2Orchestrator {
  private readonly sectionWriters: Record<ScriptStrategy, SectionScriptWriter>;

  constructor(
    private readonly deps: VideoV2Dependencies = defaultVideoV2Dependencies(),
    private readonly options: OrchestratorOptions = {}
  ) {
    this.sectionWriters = createSectionWriters(deps.writer);
  }

  async run(input: VideoV2ConfigInput, context: RunContext = {}): Promise<LongFormV2State> {
    const state = createLongFormV2State(input);
    const { config } = state;
    const { runner, pool } = startRun(state, CHECKPOINT_DIRS.video, this.options, context);
    const { writer } = this.deps;
    const sectionWriter = this.sectionWriters[config.scriptStrategy];

    await runResearchStage(runner, this.deps.researcher, pool, 'lf2_after_research');

    // ----- Outline and review gate -----
    const outline = await runner.step('outline', null, async (s) => {
      runner.progress('Generating video outline...', 0.09);
      let current = await writer.generateOutline(config, s);
      s.outline = current;
      await runner.checkpoint('lf2_after_outline');

      runner.progress('Evaluating outline quality...', 0.13);
      let review = await writer.reviewOutline(config, current);
      s.outlineReview = review;
      await runner.checkpoint('lf2_after_outline_review');

      while (!review.passed && s.outlineRevisionCount < MAX_OUTLINE_REVISIONS) {
        s.outlineRevisionCount += 1;
        runner.progress(
          `Revising outline (attempt ${s.outlineRevisionCount}/${MAX_OUTLINE_REVISIONS})...`,
          0.13 + s.outlineRevisionCount * 0.02
        );
        current = await writer.generateOutline(config, s, review.revisionNotes);
        s.outline = current;
        review = await writer.reviewOutline(config, current);
        s.outlineReview = review;
        await runner.checkpoint(`lf2_outline_revision_${s.outlineRevisionCount}`);
      }

      s.sections = current.sections.map(createSectionV2State);
      return current;
    });
    runner.progress(`Outline ready: ${state.sections.length} sections`, 0.18);

    // ----- Section scripts -----
    await runner.step('script_writing', 'lf2_after_scripts', (s) =>
      sectionWriter.writeAll(s.sections, { config, outline, researchBrief: s.researchBrief }, (message, fraction) =>
        runner.progress(message, fraction)
      )
    );
    const fullScript = state.sections.flatMap((s) => (s.sectionScript ? [s.sectionScript] : [])).join(' ');
    state.fullScript = fullScript;
    runner.progress('All section scripts complete.', 0.35);

    // ----- Audio -----
    runner.progress('Generating audio for all sections (parallel)...', 0.36);
    await runner.step('audio', 'lf2_after_audio', (s) =>
      runner.fanOut(s.sections, async (section) => {
        const script = section.sectionScript;
        if (!script) return;
        const audio = await this.deps.tts.synthesize(
          { text: section.ttsScript ?? script, voiceActor: config.voiceActor, model: config.voiceModelVersion },
          pool
        );
        section.audioPath = audio.audioPath;
        section.wordAlignments = audio.words;
        section.segments = await writer.segmentSectionScript(script, config.modelProvider);
        section.segmentTimings = this.deps.aligner.align(audio.words, section.segments);
      })
    );
    runner.progress('All section audio generated.', 0.48);

    // ----- Visual planning -----
    await runner.step('visual_planning', 'lf2_after_storyboards', async (s) => {
      runner.progress('Creating visual style guide...', 0.49);
      const styleGuide = await writer.generateStyleGuide(config);
      s.styleGuide = styleGuide;

      runner.progress('Building section storyboards (parallel)...', 0.51);
      await runner.fanOut(s.sections, async (section) => {
        if (section.segments.length === 0) return;
        section.storyboard = await writer.generateStoryboard(
          config,
          sectionBeats(section.segments, section.segmentTimings),
          styleGuide
        );
        section.visualPlans = buildVisualPlansFromStoryboard(section.storyboard);
      });
    });
    runner.progress('Storyboards complete.', 0.55);

    // ----- Images and clips -----
    runner.progress('Generating images for all sections...', 0.56);
    await runner.step('image_generation', 'lf2_after_images', (s) =>
      runner.fanOut(s.sections, (section) =>
        generatePlanImages(
          section.visualPlans,
          this.deps.images,
          { orientation: config.orientation, provider: config.imageProvider },
          pool
        )
      )
    );
    runner.progress('All images generated.', 0.72);

    runner.progress('Creating video clips for all sections...', 0.73);
    await runner.step('video_clips', 'lf2_after_clips', (s) =>
      runner.fanOut(s.sections, async (section) => {
        if (section.visualPlans.length === 0) return;
        section.clipPaths =
          config.visualMode === 'video_gen'
            ? await generatePlanClips(
                section.visualPlans,
                section.segmentTimings,
                this.deps.videos,
                { orientation: config.orientation, provider: config.videoProvider },
                pool
              )
            : await animatePlans(section.visualPlans, this.deps.renderer, config);
      })
    );
    runner.progress('All video clips created.', 0.83);

    // ----- Assembly -----
    runner.progress('Assembling section videos (parallel)...', 0.84);
    await runner.step('section_assembly', 'lf2_after_section_assembly', (s) =>
      runner.fanOut(s.sections, async (section, index) => {
        if (section.clipPaths.length === 0 || !section.audioPath) return;
        section.sectionVideoPath = await this.deps.renderer.concatAndMux({
          clipPaths: section.clipPaths,
          audioPath: section.audioPath,
          orientation: config.orientation,
          addEndBuffer: false,
          subtitleWords: config.addSubtitles ? section.wordAlignments : null,
          outputPath: sectionVideoPath(runner.runId, index),
        });
      })
    );

    runner.progress('Concatenating final video...', 0.93);
    const videoPath = await runner.step('assembly', 'lf2_complete', async (s) => {
      const sectionPaths = s.sections.flatMap((sec) => (sec.sectionVideoPath ? [sec.sectionVideoPath] : []));
      s.finalVideoPath = await this.deps.renderer.concatSections(
        sectionPaths,
        finalVideoPath(`long_form_v2_${slugify(config.topic)}`, runner.runId)
      );
      return s.finalVideoPath;
    });

    await this.deps.history.record({
      topic: config.topic,
      videoType: 'long_form_v2',
      durationSeconds: config.durationSeconds,
      orientation: config.orientation,
      modelProvider: config.modelProvider,
      imageProvider: config.imageProvider,
      voiceActor: config.voiceActor,
      videoPath,
      script: fullScript,
      goal: outline.thesis,
    });

    runner.progress('Long-form video generation complete!', 1);
    return state;
  }
}

export default new LongFormV2Orchestrator();
