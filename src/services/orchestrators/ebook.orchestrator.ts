import {
  createChapterState,
  createEbookState,
  type ChapterState,
  type EbookConfigInput,
  type EbookState,
  type SectionContent,
} from '../../types/ebook.types';
import ebookRenderer, { type EbookRenderer } from '../ebook/ebook-renderer.service';
import ebookWriter, { type EbookWriterService } from '../ebook/ebook-writer.service';
import imageService, { type ImageGenerator } from '../image/image.service';
import { CHECKPOINT_DIRS, startRun, type OrchestratorOptions, type RunContext } from './run-context';

/** The section a chapter illustration is drawn from: edited when available. */
export function openingSection(chapter: ChapterState): SectionContent | null {
  if (chapter.editedSections.length > 0) return chapter.editedSections[0];
  if (chapter.rawSections.length > 0) return chapter.rawSections[0];
  return null;
}

export interface EbookDependencies {
  writer: EbookWriterService;
  images: ImageGenerator;
  renderer: EbookRenderer;
}

// ===========================================================================
// Ebook
//
//   outline -> introduction -> chapters (in order, previous summary as the
//   baton) -> conclusion -> editing pass (parallel) -> section images?
//   -> cover -> PDF / DOCX
// ===========================================================================

export class EbookOrchestrator {
  constructor(
    private readonly deps: EbookDependencies = { writer: ebookWriter, images: imageService, renderer: ebookRenderer },
    private readonly options: OrchestratorOptions = {}
  ) {}

  async run(input: EbookConfigInput, context: RunContext = {}): Promise<EbookState> {
    const state = createEbookState(input);
    const { config } = state;
    const { runner, pool } = startRun(state, CHECKPOINT_DIRS.ebook, this.options, context);
    const { writer } = this.deps;

    runner.progress('Generating ebook outline...', 0.05);
    const outline = await runner.step('generate_outline', 'after_outline', async (s) => {
      const generated = await writer.generateOutline(config);
      s.outline = generated;
      s.chapters = generated.chapters.map(createChapterState);
      return generated;
    });
    const chapterCount = state.chapters.length;

    runner.progress('Writing introduction...', 0.1);
    await runner.step('write_introduction', 'after_introduction', async (s) => {
      s.introductionText = await writer.writeIntroduction(config, outline);
    });

    await runner.sequence<ChapterState, string>(state.chapters, (chapter, index, previous) => {
      runner.progress(
        `Writing chapter ${index + 1}/${chapterCount}: ${chapter.outline.chapterTitle}...`,
        0.12 + (index / chapterCount) * 0.4
      );
      return runner.step(`write_chapter_${index + 1}`, `after_chapter_${index + 1}`, async () => {
        const written = await writer.writeChapter(config, outline, chapter.outline, previous ?? '');
        chapter.rawSections = written.sections;
        chapter.rawSummary = written.chapterSummary;
        return written.chapterSummary;
      });
    });

    runner.progress('Writing conclusion...', 0.55);
    await runner.step('write_conclusion', 'after_conclusion', async (s) => {
      s.conclusionText = await writer.writeConclusion(
        config,
        outline,
        s.chapters.map((c) => c.rawSummary)
      );
    });

    runner.progress('Editing and polishing chapters...', 0.6);
    await runner.step('edit_chapters', 'after_editing', (s) =>
      runner.fanOut(s.chapters, async (chapter, index) => {
        chapter.editedSections = await writer.editChapter(config, chapter.outline.chapterTitle, chapter.rawSections, {
          previousSummary: index > 0 ? s.chapters[index - 1].rawSummary : '',
          nextSummary: index < chapterCount - 1 ? s.chapters[index + 1].rawSummary : '',
        });
      })
    );

    if (config.includeImages) {
      runner.progress('Generating section images...', 0.72);
      await runner.step('generate_section_images', 'after_section_images', async (s) => {
        const illustrated = s.chapters.flatMap((chapter) => {
          const section = openingSection(chapter);
          return section ? [{ chapter, section }] : [];
        });
        await runner.fanOut(illustrated, async ({ chapter, section }) => {
          chapter.sectionImageDescription = await writer.describeSectionImage(config, section);
        });
        await runner.fanOut(illustrated, async ({ chapter }) => {
          if (!chapter.sectionImageDescription) return;
          const imagePath = await this.deps.images.generateImage(
            chapter.sectionImageDescription,
            'landscape',
            config.imageProvider,
            pool
          );
          chapter.sectionImagePaths = [imagePath];
        });
      });
    }

    runner.progress('Generating cover image...', 0.82);
    await runner.step('generate_cover', 'after_cover', async (s) => {
      const description = await writer.describeCover(config, outline);
      s.coverDescription = description;
      s.coverImagePath = await this.deps.images.generateImage(description, 'portrait', config.imageProvider, pool);
    });

    runner.progress('Rendering output files...', 0.9);
    await runner.step('render_output', 'complete', async (s) => {
      if (config.outputFormats.includes('pdf')) {
        runner.progress('Rendering PDF...', 0.92);
        s.pdfPath = await this.deps.renderer.renderPdf(s);
      }
      if (config.outputFormats.includes('docx')) {
        runner.progress('Rendering DOCX...', 0.96);
        s.docxPath = await this.deps.renderer.renderDocx(s);
      }
    });

    runner.progress('Ebook generation complete!', 1);
    return state;
  }
}

export default new EbookOrchestrator();
