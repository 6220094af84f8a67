import { createShortFormState, type ShortFormState, type VideoConfigInput } from '../../types/pipeline.types';
import { slugify } from '../../utils/file-naming';
import { finalVideoPath } from '../media/video-assembler.service';
import { planVisuals } from '../planning/visual-planner';
import scriptGenerator, { type ScriptGeneratorService } from '../script/script-generator.service';
import {
  CHECKPOINT_DIRS,
  defaultMediaDependencies,
  startRun,
  type MediaDependencies,
  type OrchestratorOptions,
  type RunContext,
} from './run-context';
import { animatePlans, generatePlanClips, generatePlanImages } from './visual-stages';

export interface ShortFormDependencies extends MediaDependencies {
  scripts: ScriptGeneratorService;
}

/**
 * Single-narration short video: goal, hook and script, one voice-over,
 * B-roll per segment, one final render.
 */
export class ShortFormOrchestrator {
  constructor(
    private readonly deps: ShortFormDependencies = { ...defaultMediaDependencies(), scripts: scriptGenerator },
    private readonly options: OrchestratorOptions = {}
  ) {}

  async run(input: VideoConfigInput, context: RunContext = {}): Promise<ShortFormState> {
    const state = createShortFormState(input);
    const { config } = state;
    const { runner, pool } = startRun(state, CHECKPOINT_DIRS.video, this.options, context);
    const { scripts } = this.deps;

    runner.progress('Generating video goal...', 0.05);
    await runner.step('generate_goal', 'after_goal', async (s) => {
      s.goal = await scripts.generateGoal(config);
    });

    runner.progress('Crafting opening hook...', 0.1);
    const hook = await runner.step('generate_hook', 'after_hook', async (s) => {
      s.hook = await scripts.generateHook(config);
      return s.hook;
    });

    runner.progress('Writing narration script...', 0.18);
    const script = await runner.step('generate_script', 'after_script', async (s) => {
      s.script = await scripts.generateScript(config, s.goal ?? '', hook);
      return s.script;
    });

    runner.progress('Enhancing script for voice generation...', 0.25);
    const enhanced = await runner.step('enhance_script', 'after_enhance', async (s) => {
      s.enhancedScript = config.enhanceForTts ? await scripts.enhanceScript(script, config.modelProvider) : script;
      return s.enhancedScript;
    });

    runner.progress('Segmenting script into clips...', 0.3);
    await runner.step('segment_script', 'after_segment', async (s) => {
      s.segments = await scripts.segmentScript(script, enhanced, config.modelProvider);
    });

    runner.progress('Generating voice-over audio...', 0.38);
    const audioPath = await runner.step('generate_audio', 'after_audio', async (s) => {
      const audio = await this.deps.tts.synthesize(
        { text: enhanced, voiceActor: config.voiceActor, model: config.voiceModelVersion },
        pool
      );
      s.audioPath = audio.audioPath;
      s.wordAlignments = audio.words;
      const texts = s.segments.map((seg) => (config.enhanceForTts ? seg.enhancedScriptSegment : seg.scriptSegment));
      s.segmentTimings = this.deps.aligner.align(audio.words, texts);
      return audio.audioPath;
    });

    runner.progress('Planning visual layout...', 0.45);
    await runner.step('plan_visuals', null, (s) => {
      s.visualPlans = planVisuals(s.segmentTimings, config);
    });

    runner.progress('Generating image descriptions...', 0.5);
    await runner.step('generate_image_descriptions', 'after_image_descriptions', async (s) => {
      await runner.fanOut(s.visualPlans, async (plan) => {
        plan.imageDescriptions = await scripts.generateImageDescriptions(config, {
          scriptSegment: s.segments[plan.segmentIndex]?.scriptSegment ?? '',
          fullScript: script,
          numImages: plan.numImages,
        });
      });
    });

    runner.progress('Generating B-roll images...', 0.6);
    await runner.step('generate_images', 'after_images', async (s) => {
      await generatePlanImages(
        s.visualPlans,
        this.deps.images,
        { orientation: config.orientation, provider: config.imageProvider },
        pool
      );
    });

    await runner.step('animate_segments', 'after_animation', async (s) => {
      if (config.visualMode === 'video_gen') {
        runner.progress(`Generating video clips via ${config.videoProvider}...`, 0.78);
        s.clipPaths = await generatePlanClips(
          s.visualPlans,
          s.segmentTimings,
          this.deps.videos,
          { orientation: config.orientation, provider: config.videoProvider },
          pool
        );
      } else {
        runner.progress('Animating images into video clips...', 0.78);
        s.clipPaths = await animatePlans(s.visualPlans, this.deps.renderer, config);
      }
    });

    runner.progress('Assembling final video...', 0.9);
    const videoPath = await runner.step('assemble_final_video', 'complete', async (s) => {
      s.finalVideoPath = await this.deps.renderer.concatAndMux({
        clipPaths: s.clipPaths,
        audioPath,
        orientation: config.orientation,
        addEndBuffer: config.addEndBuffer,
        subtitleWords: config.addSubtitles ? s.wordAlignments : null,
        outputPath: finalVideoPath(`short_form_${slugify(config.topic)}`, runner.runId),
      });
      return s.finalVideoPath;
    });

    await this.deps.history.record({
      topic: config.topic,
      videoType: 'short_form',
      durationSeconds: config.durationSeconds,
      orientation: config.orientation,
      modelProvider: config.modelProvider,
      imageProvider: config.imageProvider,
      voiceActor: config.voiceActor,
      videoPath,
      script,
      goal: state.goal ?? undefined,
    });

    runner.progress('Video generation complete!', 1);
    return state;
  }
}

export default new ShortFormOrchestrator();
