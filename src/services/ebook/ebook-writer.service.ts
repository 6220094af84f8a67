import { logger } from '../../config/logger';
import {
  ChapterContentSchema,
  ConclusionSchema,
  CoverDescriptionSchema,
  EbookOutlineSchema,
  EditedChapterSchema,
  IntroductionSchema,
  SectionImageDescriptionSchema,
  type ChapterOutline,
  type EbookConfig,
  type EbookOutline,
  type SectionContent,
} from '../../types/ebook.types';
import structuredGenerationClient, { type StructuredGenerator } from '../llm/structured-generation.client';
import {
  EBOOK_CHAPTER_WRITER_PROMPT,
  EBOOK_CONCLUSION_PROMPT,
  EBOOK_COVER_DESCRIPTION_PROMPT,
  EBOOK_EDITOR_PROMPT,
  EBOOK_INTRODUCTION_PROMPT,
  EBOOK_OUTLINE_PROMPT,
  EBOOK_SECTION_IMAGE_PROMPT,
} from './prompt-templates';

const EXCERPT_LENGTH = 200;

export interface WrittenChapter {
  sections: SectionContent[];
  chapterSummary: string;
}

/** The writing agents of the ebook pipeline, one structured call each. */
export class EbookWriterService {
  constructor(private readonly llm: StructuredGenerator = structuredGenerationClient) {}

  async generateOutline(config: EbookConfig): Promise<EbookOutline> {
    const outline = await this.llm.generate({
      system: EBOOK_OUTLINE_PROMPT,
      payload: {
        title: config.title,
        subtitle: config.subtitle,
        topic: config.topic,
        targetAudience: config.targetAudience,
        tone: config.tone,
        writingStyle: config.writingStyle,
        numChapters: config.numChapters,
        additionalInstructions: config.additionalInstructions,
      },
      schema: EbookOutlineSchema,
      schemaName: 'EbookOutline',
      provider: config.modelProvider,
    });
    logger.info(`Ebook outline: "${outline.ebookTitle}", ${outline.chapters.length} chapters`);
    return outline;
  }

  async writeIntroduction(config: EbookConfig, outline: EbookOutline): Promise<string> {
    const { introductionText } = await this.llm.generate({
      system: EBOOK_INTRODUCTION_PROMPT,
      payload: {
        title: outline.ebookTitle,
        subtitle: outline.ebookSubtitle,
        topic: config.topic,
        targetAudience: config.targetAudience,
        tone: config.tone,
        writingStyle: config.writingStyle,
        chapterTitles: outline.chapters.map((c) => c.chapterTitle),
        additionalInstructions: config.additionalInstructions,
      },
      schema: IntroductionSchema,
      schemaName: 'Introduction',
      provider: config.modelProvider,
    });
    return introductionText;
  }

  /** `previousSummary` is empty for the first chapter. */
  async writeChapter(
    config: EbookConfig,
    outline: EbookOutline,
    chapter: ChapterOutline,
    previousSummary: string
  ): Promise<WrittenChapter> {
    const result = await this.llm.generate({
      system: EBOOK_CHAPTER_WRITER_PROMPT,
      payload: {
        ebookTitle: outline.ebookTitle,
        targetAudience: config.targetAudience,
        tone: config.tone,
        writingStyle: config.writingStyle,
        chapterOutline: chapter,
        previousChapterSummary: previousSummary,
        fullOutlineContext: JSON.stringify(outline.chapters.map((c) => c.chapterTitle)),
        additionalInstructions: config.additionalInstructions,
      },
      schema: ChapterContentSchema,
      schemaName: 'ChapterContent',
      provider: config.modelProvider,
    });
    logger.info(`Chapter "${chapter.chapterTitle}": ${result.sections.length} sections`);
    return { sections: result.sections, chapterSummary: result.chapterSummary };
  }

  async writeConclusion(config: EbookConfig, outline: EbookOutline, chapterSummaries: string[]): Promise<string> {
    const { conclusionText } = await this.llm.generate({
      system: EBOOK_CONCLUSION_PROMPT,
      payload: {
        title: outline.ebookTitle,
        topic: config.topic,
        targetAudience: config.targetAudience,
        tone: config.tone,
        writingStyle: config.writingStyle,
        chapterSummaries,
        additionalInstructions: config.additionalInstructions,
      },
      schema: ConclusionSchema,
      schemaName: 'Conclusion',
      provider: config.modelProvider,
    });
    return conclusionText;
  }

  async editChapter(
    config: EbookConfig,
    chapterTitle: string,
    sections: SectionContent[],
    context: { previousSummary: string; nextSummary: string }
  ): Promise<SectionContent[]> {
    const edited = await this.llm.generate({
      system: EBOOK_EDITOR_PROMPT,
      payload: {
        chapterTitle,
        sections,
        previousChapterSummary: context.previousSummary,
        nextChapterSummary: context.nextSummary,
        tone: config.tone,
        writingStyle: config.writingStyle,
      },
      schema: EditedChapterSchema,
      schemaName: 'EditedChapter',
      provider: config.modelProvider,
    });
    return edited.sections;
  }

  async describeSectionImage(config: EbookConfig, section: SectionContent): Promise<string> {
    const { imageDescription } = await this.llm.generate({
      system: EBOOK_SECTION_IMAGE_PROMPT,
      payload: {
        sectionTitle: section.sectionTitle,
        sectionTextExcerpt: section.sectionText.slice(0, EXCERPT_LENGTH),
        ebookTopic: config.topic,
        imageStyle: config.imageStyle,
        allowFaces: config.allowFaces,
      },
      schema: SectionImageDescriptionSchema,
      schemaName: 'SectionImageDescription',
      provider: config.modelProvider,
    });
    return imageDescription;
  }

  async describeCover(config: EbookConfig, outline: EbookOutline): Promise<string> {
    const { coverDescription } = await this.llm.generate({
      system: EBOOK_COVER_DESCRIPTION_PROMPT,
      payload: {
        title: outline.ebookTitle,
        subtitle: outline.ebookSubtitle,
        topic: config.topic,
        tone: config.tone,
        imageStyle: config.imageStyle,
        allowFaces: config.allowFaces,
      },
      schema: CoverDescriptionSchema,
      schemaName: 'CoverDescription',
      provider: config.modelProvider,
    });
    return coverDescription;
  }
}

export default new EbookWriterService();
