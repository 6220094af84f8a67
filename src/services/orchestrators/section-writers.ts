import type { ProgressCallback } from '../pipeline/stage-runner';
import { fanOut, sequence } from '../pipeline/stage-runner';
import type { ScriptWriterV2Service } from '../script/script-writer-v2.service';
import type {
  ResearchBrief,
  ScriptStrategy,
  SectionV2State,
  VideoOutlineV2,
  VideoV2Config,
} from '../../types/v2.types';

export interface SectionWritingContext {
  config: VideoV2Config;
  outline: VideoOutlineV2;
  researchBrief: ResearchBrief | null;
}

/**
 * Fills `sectionScript` and `ttsScript` on every section. Sections are
 * written in place, so finished ones survive a failing sibling.
 */
export interface SectionScriptWriter {
  readonly strategy: ScriptStrategy;
  writeAll(sections: SectionV2State[], context: SectionWritingContext, onProgress: ProgressCallback): Promise<void>;
}

function precedingPlan(outline: VideoOutlineV2, index: number) {
  return index > 0 ? outline.sections[index - 1] : null;
}

/** All sections at once without shared context, then one connector pass over the seams. */
export class ParallelSectionWriter implements SectionScriptWriter {
  readonly strategy = 'parallel';

  constructor(private readonly writer: ScriptWriterV2Service) {}

  async writeAll(sections: SectionV2State[], context: SectionWritingContext, onProgress: ProgressCallback): Promise<void> {
    onProgress('Writing section scripts (parallel)...', 0.19);
    await fanOut(sections, async (section, index) => {
      const result = await this.writer.writeSectionScript(context.config, {
        outline: context.outline,
        sectionPlan: section.sectionPlan,
        precedingSectionPlan: precedingPlan(context.outline, index),
        cumulativeScript: '',
        researchBrief: context.researchBrief,
      });
      section.sectionScript = result.sectionScript;
      section.ttsScript = result.ttsScript;
    });

    const smoothed = await this.writer.connectSections(
      sections.map((section) => ({
        sectionName: section.sectionPlan.sectionName,
        sectionScript: section.sectionScript ?? '',
        transitionFromPrevious: section.sectionPlan.transitionFromPrevious,
      })),
      context.config.modelProvider
    );
    smoothed.forEach((script, i) => {
      sections[i].sectionScript = script;
    });
  }
}

/** One section at a time; each sees the narration written before it. */
export class SequentialSectionWriter implements SectionScriptWriter {
  readonly strategy = 'sequential';

  constructor(private readonly writer: ScriptWriterV2Service) {}

  async writeAll(sections: SectionV2State[], context: SectionWritingContext, onProgress: ProgressCallback): Promise<void> {
    onProgress('Writing section scripts (sequential)...', 0.19);
    await sequence<SectionV2State, string>(sections, async (section, index, cumulative = '') => {
      onProgress(
        `Writing section ${index + 1}/${sections.length}: ${section.sectionPlan.sectionName}...`,
        0.19 + (index / sections.length) * 0.14
      );
      const result = await this.writer.writeSectionScript(context.config, {
        outline: context.outline,
        sectionPlan: section.sectionPlan,
        precedingSectionPlan: precedingPlan(context.outline, index),
        cumulativeScript: cumulative,
        researchBrief: context.researchBrief,
      });
      section.sectionScript = result.sectionScript;
      section.ttsScript = result.ttsScript;
      return `${cumulative}${result.sectionScript} `;
    });
  }
}

export function createSectionWriters(writer: ScriptWriterV2Service): Record<ScriptStrategy, SectionScriptWriter> {
  return {
    parallel: new ParallelSectionWriter(writer),
    sequential: new SequentialSectionWriter(writer),
  };
}
