import { UGC_MOTION_PATTERN } from '../../config/settings';
import { createUGCState, type UGCConfigInput, type UGCState } from '../../types/ugc.types';
import { slugify } from '../../utils/file-naming';
import { finalVideoPath } from '../media/video-assembler.service';
import { assignMotions, emptyVisualPlan } from '../planning/visual-planner';
import scriptGenerator, { type ScriptGeneratorService } from '../script/script-generator.service';
import mediaAnalyzer, { type MediaAnalyzer } from '../ugc/media-analyzer.service';
import ugcWriter, { type UGCWriterService } from '../ugc/ugc-writer.service';
import {
  CHECKPOINT_DIRS,
  defaultMediaDependencies,
  startRun,
  type MediaDependencies,
  type OrchestratorOptions,
  type RunContext,
} from './run-context';

export interface UGCDependencies extends MediaDependencies {
  analyzer: MediaAnalyzer;
  writer: UGCWriterService;
  scripts: ScriptGeneratorService;
}

const DEFAULT_SCENE_SECONDS = 3;

/**
 * Product review video in the style of creator content: reference videos
 * and product photos inform the script, every narration segment gets one
 * scene, and no subtitles are burned in.
 */
export class UGCOrchestrator {
  constructor(
    private readonly deps: UGCDependencies = {
      ...defaultMediaDependencies(),
      analyzer: mediaAnalyzer,
      writer: ugcWriter,
      scripts: scriptGenerator,
    },
    private readonly options: OrchestratorOptions = {}
  ) {}

  async run(input: UGCConfigInput, context: RunContext = {}): Promise<UGCState> {
    const state = createUGCState(input);
    const { config } = state;
    const { runner, pool } = startRun(state, CHECKPOINT_DIRS.ugc, this.options, context);
    const { analyzer, writer, scripts } = this.deps;

    if (config.referenceVideoPaths.length > 0) {
      runner.progress(`Analyzing ${config.referenceVideoPaths.length} reference video(s)...`, 0.03);
      await runner.step('analyze_reference_videos', 'after_ref_analysis', async (s) => {
        s.referenceAnalyses = await analyzer.analyzeReferenceVideos(config.referenceVideoPaths);
      });
      runner.progress(`Analyzed ${state.referenceAnalyses.length} reference video(s)`, 0.07);
    }

    runner.progress('Analyzing product images...', 0.1);
    const productDescription = await runner.step('describe_product', 'after_product_description', async (s) => {
      s.productVisualDescription = await analyzer.describeProduct(config.productImagePaths);
      return s.productVisualDescription;
    });

    runner.progress('Writing product review script...', 0.18);
    const script = await runner.step('generate_script', 'after_script', async (s) => {
      s.script = await writer.generateScript(config, s.referenceAnalyses);
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
      s.segmentTimings = this.deps.aligner.align(
        audio.words,
        s.segments.map((seg) => (config.enhanceForTts ? seg.enhancedScriptSegment : seg.scriptSegment))
      );
      return audio.audioPath;
    });

    runner.progress('Planning visual scenes...', 0.48);
    const scenes = await runner.step('plan_scenes', 'after_scene_plan', async (s) => {
      s.sceneDescriptions = await writer.planScenes(config, {
        segmentTexts: s.segments.map((seg) => seg.scriptSegment),
        segmentDurations: s.segmentTimings.map((t) => t.duration),
        productVisualDescription: productDescription,
      });
      return s.sceneDescriptions;
    });

    runner.progress('Generating product images in realistic environments...', 0.58);
    await runner.step('generate_images', 'after_images', async (s) => {
      s.sceneImagePaths = scenes.map(() => null);
      await runner.fanOut(scenes, async (scene, i) => {
        s.sceneImagePaths[i] = await this.deps.images.generateImage(
          scene.imagePrompt,
          config.orientation,
          config.imageProvider,
          pool
        );
      });
    });

    await runner.step('generate_video_clips', 'after_clips', async (s) => {
      if (config.visualMode === 'video_gen') {
        runner.progress(`Generating video clips via ${config.videoProvider}...`, 0.72);
        s.clipPaths = scenes.map(() => null);
        await runner.fanOut(scenes, async (scene, i) => {
          s.clipPaths[i] = await this.deps.videos.generateClip(
            {
              prompt: scene.videoPrompt,
              durationSeconds: scene.durationSeconds,
              orientation: config.orientation,
              provider: config.videoProvider,
              imagePath: s.sceneImagePaths[i] ?? null,
            },
            pool
          );
        });
        return;
      }

      runner.progress('Animating images into video clips...', 0.72);
      const stills = s.sceneImagePaths.flatMap((imagePath, i) => (imagePath ? [{ scene: scenes[i], imagePath }] : []));
      const motions = assignMotions(
        stills.map(() => 1),
        UGC_MOTION_PATTERN
      );
      s.clipPaths = stills.map(() => null);
      await runner.fanOut(stills, async ({ scene, imagePath }, i) => {
        s.clipPaths[i] = await this.deps.renderer.renderClip({
          imagePaths: [imagePath],
          durations: [scene.durationSeconds],
          motions: motions[i],
          orientation: config.orientation,
        });
      });
    });

    runner.progress('Assembling final video...', 0.92);
    const videoPath = await runner.step('assemble_final_video', 'complete', async (s) => {
      const clipPaths = s.clipPaths.filter((clipPath): clipPath is string => clipPath !== null);
      s.visualPlans = clipPaths.map((clipPath, i) => {
        const timing = s.segmentTimings[i];
        const imagePath = s.sceneImagePaths[i];
        const plan = emptyVisualPlan(i, 1, timing ? timing.duration : DEFAULT_SCENE_SECONDS);
        plan.videoPath = clipPath;
        plan.imagePaths = imagePath ? [imagePath] : [];
        return plan;
      });
      s.finalVideoPath = await this.deps.renderer.concatAndMux({
        clipPaths,
        audioPath,
        orientation: config.orientation,
        addEndBuffer: config.addEndBuffer,
        subtitleWords: null,
        outputPath: finalVideoPath(`ugc_${slugify(config.productName)}`, runner.runId),
      });
      return s.finalVideoPath;
    });

    await this.deps.history.record({
      topic: config.productName,
      videoType: 'ugc',
      durationSeconds: config.durationSeconds,
      orientation: config.orientation,
      modelProvider: config.modelProvider,
      imageProvider: config.imageProvider,
      voiceActor: config.voiceActor,
      videoPath,
      script,
    });

    runner.progress('UGC video generation complete!', 1);
    return state;
  }
}

export default new UGCOrchestrator();
