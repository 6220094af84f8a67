import { logger } from '../../config/logger';
import { MAX_SCRIPT_REVISIONS } from '../../config/settings';
import type { VisualPlan } from '../../types/pipeline.types';
import { createShortFormV2State, type ShortFormV2State, type VideoV2ConfigInput } from '../../types/v2.types';
import { slugify } from '../../utils/file-naming';
import { finalVideoPath } from '../media/video-assembler.service';
import { errorMessage } from '../pipeline/pipeline-error';
import type { StageRunner } from '../pipeline/stage-runner';
import { buildVisualPlansFromStoryboard } from '../planning/visual-planner';
import researchService, { type Researcher } from '../research/research.service';
import scriptWriterV2, { beatDurationsMs, type ScriptWriterV2Service } from '../script/script-writer-v2.service';
import { runResearchStage } from './research-stage';
import {
  CHECKPOINT_DIRS,
  defaultMediaDependencies,
  startRun,
  type MediaDependencies,
  type OrchestratorOptions,
  type RunContext,
} from './run-context';
import { animatePlans, generatePlanClips, generatePlanImages } from './visual-stages';

export interface VideoV2Dependencies extends MediaDependencies {
  writer: ScriptWriterV2Service;
  researcher: Researcher;
}

export function defaultVideoV2Dependencies(): VideoV2Dependencies {
  return { ...defaultMediaDependencies(), writer: scriptWriterV2, researcher: researchService };
}

/** Every generated image paired with the prompt it was generated from. */
export function imagesWithPrompts(plans: readonly VisualPlan[]): { paths: string[]; prompts: string[] } {
  const paths: string[] = [];
  const prompts: string[] = [];
  for (const plan of plans) {
    plan.imagePaths.forEach((imagePath, i) => {
      const description = plan.imageDescriptions[i];
      if (!description) return;
      paths.push(imagePath);
      prompts.push(description.description);
    });
  }
  return { paths, prompts };
}

// ===========================================================================
// Short-form V2
//
//   research? -> full script -> quality gate (+ revisions) -> audio
//   -> style guide + storyboard -> images (+ visual QA) -> clips -> assembly
// ===========================================================================

export class ShortFormV2Orchestrator {
  constructor(
    private readonly deps: VideoV2Dependencies = defaultVideoV2Dependencies(),
    private readonly options: OrchestratorOptions = {}
  ) {}

  async run(input: VideoV2ConfigInput, context: RunContext = {}): Promise<ShortFormV2State> {
    const state = createShortFormV2State(input);
    const { config } = state;
    const { runner, pool } = startRun(state, CHECKPOINT_DIRS.video, this.options, context);
    const { writer } = this.deps;

    await runResearchStage(runner, this.deps.researcher, pool, 'sf2_after_research');

    // ----- Script and quality gate -----
    const script = await runner.step('script_generation', null, async (s) => {
      runner.progress('Generating script (single-pass)...', 0.1);
      let current = await writer.generateFullScript(config, s);
      s.fullScript = current;
      await runner.checkpoint('sf2_after_script');

      runner.progress('Evaluating script quality...', 0.16);
      let report = await writer.evaluateScript(config, current);
      s.qualityReport = report;
      await runner.checkpoint('sf2_after_quality_gate');

      while (!report.passed && s.scriptRevisionCount < MAX_SCRIPT_REVISIONS) {
        s.scriptRevisionCount += 1;
        runner.progress(
          `Revising script (attempt ${s.scriptRevisionCount}/${MAX_SCRIPT_REVISIONS})...`,
          0.16 + s.scriptRevisionCount * 0.02
        );
        current = await writer.reviseScript(config, current, report, s.researchBrief);
        s.fullScript = current;
        report = await writer.evaluateScript(config, current);
        s.qualityReport = report;
        await runner.checkpoint(`sf2_revision_${s.scriptRevisionCount}`);
      }
      return current;
    });
    runner.progress('Script finalized.', 0.22);

    // ----- Audio -----
    runner.progress('Generating voice-over...', 0.24);
    const audioPath = await runner.step('audio', 'sf2_after_audio', async (s) => {
      const audio = await this.deps.tts.synthesize(
        {
          text: script.beats.map((b) => b.ttsText).join(' '),
          voiceActor: config.voiceActor,
          model: config.voiceModelVersion,
        },
        pool
      );
      s.audioPath = audio.audioPath;
      s.wordAlignments = audio.words;
      s.segmentTimings = this.deps.aligner.align(
        audio.words,
        script.beats.map((b) => b.ttsText)
      );
      return audio.audioPath;
    });
    runner.progress('Audio generated and aligned.', 0.35);

    // ----- Visual planning -----
    await runner.step('visual_planning', 'sf2_after_storyboard', async (s) => {
      runner.progress('Creating visual style guide...', 0.36);
      const styleGuide = await writer.generateStyleGuide(config);
      s.styleGuide = styleGuide;

      runner.progress('Building storyboard...', 0.38);
      const durations = beatDurationsMs(script.beats.length, s.segmentTimings);
      s.storyboard = await writer.generateStoryboard(
        config,
        script.beats.map((beat, i) => ({
          rawText: beat.rawText,
          visualIntent: beat.visualIntent,
          beatType: beat.beatType,
          energyLevel: beat.energyLevel,
          durationMs: durations[i],
        })),
        styleGuide
      );
    });
    runner.progress('Storyboard complete.', 0.42);

    // ----- Images and visual QA -----
    runner.progress('Generating images...', 0.44);
    await runner.step('image_generation', 'sf2_after_images', async (s) => {
      s.visualPlans = buildVisualPlansFromStoryboard(s.storyboard);
      await generatePlanImages(
        s.visualPlans,
        this.deps.images,
        { orientation: config.orientation, provider: config.imageProvider },
        pool
      );
    });
    runner.progress('Images generated.', 0.62);

    await this.runVisualQa(runner);

    // ----- Clips and assembly -----
    await runner.step('video_clips', 'sf2_after_clips', async (s) => {
      if (config.visualMode === 'video_gen') {
        runner.progress(`Generating video clips via ${config.videoProvider}...`, 0.7);
        s.clipPaths = await generatePlanClips(
          s.visualPlans,
          s.segmentTimings,
          this.deps.videos,
          { orientation: config.orientation, provider: config.videoProvider },
          pool
        );
      } else {
        runner.progress('Animating images (zoompan)...', 0.7);
        s.clipPaths = await animatePlans(s.visualPlans, this.deps.renderer, config);
      }
    });
    runner.progress('Video clips created.', 0.82);

    runner.progress('Assembling final video...', 0.85);
    const videoPath = await runner.step('assembly', 'sf2_complete', async (s) => {
      s.finalVideoPath = await this.deps.renderer.concatAndMux({
        clipPaths: s.clipPaths,
        audioPath,
        orientation: config.orientation,
        addEndBuffer: config.addEndBuffer,
        subtitleWords: config.addSubtitles ? s.wordAlignments : null,
        outputPath: finalVideoPath(`short_form_v2_${slugify(config.topic)}`, runner.runId),
      });
      return s.finalVideoPath;
    });

    await this.deps.history.record({
      topic: config.topic,
      videoType: 'short_form_v2',
      durationSeconds: config.durationSeconds,
      orientation: config.orientation,
      modelProvider: config.modelProvider,
      imageProvider: config.imageProvider,
      voiceActor: config.voiceActor,
      videoPath,
      script: script.beats.map((b) => b.rawText).join(' '),
      goal: script.goal,
    });

    runner.progress('Video generation complete!', 1);
    return state;
  }

  /** Scores are informational; a failed assessment never stops the run. */
  private async runVisualQa(runner: StageRunner<ShortFormV2State>): Promise<void> {
    const state = runner.state;
    const { paths, prompts } = imagesWithPrompts(state.visualPlans);
    if (paths.length === 0) return;

    runner.progress('Running visual quality check...', 0.63);
    try {
      state.visualQaResults = await this.deps.writer.assessImages(paths, prompts, state.styleGuide);
      await runner.checkpoint('sf2_after_visual_qa');
      runner.progress('Visual QA complete.', 0.68);
    } catch (error) {
      logger.warn(`Visual QA failed (non-fatal): ${errorMessage(error)}`);
      runner.progress('Visual QA skipped (non-fatal error).', 0.68);
    }
  }
}

export default new ShortFormV2Orchestrator();
