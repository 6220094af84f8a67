import {
  createLongFormState,
  createSectionState,
  type LongFormState,
  type SectionState,
  type VideoConfigInput,
} from '../../types/pipeline.types';
import { slugify } from '../../utils/file-naming';
import { finalVideoPath, sectionVideoPath } from '../media/video-assembler.service';
import { planVisuals } from '../planning/visual-planner';
import type { StageRunner } from '../pipeline/stage-runner';
import type { RateLimitedProviderPool } from '../providers/rate-limited-pool';
import scriptGenerator from '../script/script-generator.service';
import {
  CHECKPOINT_DIRS,
  defaultMediaDependencies,
  startRun,
  type OrchestratorOptions,
  type RunContext,
} from './run-context';
import type { ShortFormDependencies } from './short-form.orchestrator';
import { animatePlans, generatePlanClips, generatePlanImages } from './visual-stages';

export type LongFormDependencies = ShortFormDependencies;

// ===========================================================================
// Long-form video
//
// Goal and section structure first, then every section end to end (script,
// audio, visuals, section render) strictly in order: each section script is
// written against everything narrated before it.
// ===========================================================================

export class LongFormOrchestrator {
  constructor(
    private readonly deps: LongFormDependencies = { ...defaultMediaDependencies(), scripts: scriptGenerator },
    private readonly options: OrchestratorOptions = {}
  ) {}

  async run(input: VideoConfigInput, context: RunContext = {}): Promise<LongFormState> {
    const state = createLongFormState(input);
    const { config } = state;
    const { runner, pool } = startRun(state, CHECKPOINT_DIRS.video, this.options, context);

    runner.progress('Generating video goal...', 0.03);
    const goal = await runner.step('generate_goal', 'lf_after_goal', async (s) => {
      s.goal = await this.deps.scripts.generateGoal(config);
      return s.goal;
    });

    runner.progress('Generating video structure...', 0.08);
    await runner.step('generate_structure', 'lf_after_structure', async (s) => {
      const structure = await this.deps.scripts.generateStructure(config, goal);
      s.sections = structure.map(createSectionState);
    });
    runner.progress(`Structure: ${state.sections.length} sections planned`, 0.1);

    const cumulative = await runner.sequence<SectionState, string>(state.sections, (section, index, previous) =>
      this.processSection(runner, pool, section, index, previous ?? '')
    );
    const fullScript = (cumulative[cumulative.length - 1] ?? '').trim();
    state.fullScript = fullScript;

    runner.progress('Assembling final long-form video...', 0.93);
    const videoPath = await runner.step('concatenate_sections', 'lf_complete', async (s) => {
      const sectionPaths = s.sections.flatMap((sec) => (sec.sectionVideoPath ? [sec.sectionVideoPath] : []));
      s.finalVideoPath = await this.deps.renderer.concatSections(
        sectionPaths,
        finalVideoPath(`long_form_${slugify(config.topic)}`, runner.runId)
      );
      return s.finalVideoPath;
    });

    await this.deps.history.record({
      topic: config.topic,
      videoType: 'long_form',
      durationSeconds: config.durationSeconds,
      orientation: config.orientation,
      modelProvider: config.modelProvider,
      imageProvider: config.imageProvider,
      voiceActor: config.voiceActor,
      videoPath,
      script: fullScript,
      goal,
    });

    runner.progress('Long-form video generation complete!', 1);
    return state;
  }

  /** One section end to end; returns the cumulative script including it. */
  private async processSection(
    runner: StageRunner<LongFormState>,
    pool: RateLimitedProviderPool,
    section: SectionState,
    index: number,
    cumulativeScript: string
  ): Promise<string> {
    const { config } = runner.state;
    const { scripts } = this.deps;
    const weight = 0.8 / Math.max(runner.state.sections.length, 1);
    const base = 0.1 + index * weight;
    const label = `Section ${index + 1}/${runner.state.sections.length}`;

    runner.progress(`${label}: Writing script...`, base);
    const sectionScript = await runner.step(`section_${index}_generate_script`, `lf_sec${index}_script`, async () => {
      section.sectionScript = await scripts.generateSectionScript(config, section.structure, cumulativeScript);
      return section.sectionScript;
    });

    runner.progress(`${label}: Segmenting...`, base + weight * 0.1);
    await runner.step(`section_${index}_segment`, null, async () => {
      section.segments = await scripts.segmentSectionScript(sectionScript, config.modelProvider);
    });

    runner.progress(`${label}: Generating audio...`, base + weight * 0.2);
    const audioPath = await runner.step(`section_${index}_audio`, `lf_sec${index}_audio`, async () => {
      const audio = await this.deps.tts.synthesize(
        { text: sectionScript, voiceActor: config.voiceActor, model: config.voiceModelVersion },
        pool
      );
      section.audioPath = audio.audioPath;
      section.wordAlignments = audio.words;
      section.segmentTimings = this.deps.aligner.align(audio.words, section.segments);
      return audio.audioPath;
    });

    await runner.step(`section_${index}_plan_visuals`, null, () => {
      section.visualPlans = planVisuals(section.segmentTimings, config);
    });

    runner.progress(`${label}: Generating image descriptions...`, base + weight * 0.35);
    await runner.step(`section_${index}_image_descriptions`, `lf_sec${index}_img_desc`, async () => {
      await runner.fanOut(section.visualPlans, async (plan) => {
        plan.imageDescriptions = await scripts.generateImageDescriptions(config, {
          scriptSegment: section.segments[plan.segmentIndex] ?? '',
          fullScript: sectionScript,
          numImages: plan.numImages,
        });
      });
    });

    runner.progress(`${label}: Generating images...`, base + weight * 0.5);
    await runner.step(`section_${index}_generate_images`, `lf_sec${index}_images`, () =>
      generatePlanImages(
        section.visualPlans,
        this.deps.images,
        { orientation: config.orientation, provider: config.imageProvider },
        pool
      )
    );

    await runner.step(`section_${index}_animate`, null, async () => {
      if (config.visualMode === 'video_gen') {
        runner.progress(`${label}: Generating video clips via ${config.videoProvider}...`, base + weight * 0.7);
        section.clipPaths = await generatePlanClips(
          section.visualPlans,
          section.segmentTimings,
          this.deps.videos,
          { orientation: config.orientation, provider: config.videoProvider },
          pool
        );
      } else {
        runner.progress(`${label}: Animating clips...`, base + weight * 0.7);
        section.clipPaths = await animatePlans(section.visualPlans, this.deps.renderer, config);
      }
    });

    runner.progress(`${label}: Assembling section video...`, base + weight * 0.9);
    await runner.step(`section_${index}_assemble`, `lf_sec${index}_complete`, async () => {
      section.sectionVideoPath = await this.deps.renderer.concatAndMux({
        clipPaths: section.clipPaths,
        audioPath,
        orientation: config.orientation,
        addEndBuffer: false,
        subtitleWords: config.addSubtitles ? section.wordAlignments : null,
        outputPath: sectionVideoPath(runner.runId, index),
      });
    });

    return `${cumulativeScript}${sectionScript} `;
  }
}

export default new LongFormOrchestrator();
