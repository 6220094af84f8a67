import { z } from 'zod';
import type { ImageProviderName, LLMProviderName } from '../config/settings';

// ---------------------------------------------------------------------------
// Ebook configuration
// ---------------------------------------------------------------------------

export const EBOOK_FORMATS = ['pdf', 'docx'] as const;
export type EbookFormat = (typeof EBOOK_FORMATS)[number];

export const WRITING_STYLES = ['Conversational', 'Academic', 'Practical Guide', 'Narrative', 'Journalistic'] as const;

export const MIN_CHAPTERS = 3;
export const MAX_CHAPTERS = 20;

export interface EbookConfig {
  title: string;
  topic: string;
  targetAudience: string;
  subtitle: string;
  authorName: string;
  tone: string;
  writingStyle: string;
  numChapters: number;
  modelProvider: LLMProviderName;
  imageProvider: ImageProviderName;
  imageStyle: string;
  includeImages: boolean;
  allowFaces: boolean;
  outputFormats: EbookFormat[];
  additionalInstructions: string;
}

export type EbookConfigInput = Pick<EbookConfig, 'title' | 'topic' | 'targetAudience'> & Partial<EbookConfig>;

export function resolveEbookConfig(input: EbookConfigInput): EbookConfig {
  return {
    subtitle: '',
    authorName: '',
    tone: 'Professional',
    writingStyle: 'Practical Guide',
    numChapters: 8,
    modelProvider: 'google',
    imageProvider: 'google',
    imageStyle: 'Cinematic',
    includeImages: true,
    allowFaces: false,
    outputFormats: ['pdf'],
    additionalInstructions: '',
    ...input,
  };
}

// ---------------------------------------------------------------------------
// Structured-output containers
// ---------------------------------------------------------------------------

export const SectionOutlineSchema = z.object({
  sectionTitle: z.string().min(1),
  sectionBrief: z.string(),
});

export const ChapterOutlineSchema = z.object({
  chapterNumber: z.number().int().positive(),
  chapterTitle: z.string().min(1),
  chapterPurpose: z.string(),
  sections: z.array(SectionOutlineSchema).min(1),
  keyTakeaway: z.string(),
});

export const EbookOutlineSchema = z.object({
  ebookTitle: z.string().min(1),
  ebookSubtitle: z.string().default(''),
  chapters: z.array(ChapterOutlineSchema).min(1),
});

export const SectionContentSchema = z.object({
  sectionTitle: z.string().min(1),
  sectionText: z.string().min(1),
});

export const ChapterContentSchema = z.object({
  chapterTitle: z.string(),
  sections: z.array(SectionContentSchema).min(1),
  chapterSummary: z.string(),
});

export const EditedChapterSchema = z.object({
  sections: z.array(SectionContentSchema).min(1),
});

export const IntroductionSchema = z.object({ introductionText: z.string().min(1) });
export const ConclusionSchema = z.object({ conclusionText: z.string().min(1) });
export const CoverDescriptionSchema = z.object({ coverDescription: z.string().min(1) });
export const SectionImageDescriptionSchema = z.object({ imageDescription: z.string().min(1) });

export type SectionOutline = z.infer<typeof SectionOutlineSchema>;
export type ChapterOutline = z.infer<typeof ChapterOutlineSchema>;
export type EbookOutline = z.infer<typeof EbookOutlineSchema>;
export type SectionContent = z.infer<typeof SectionContentSchema>;

// ---------------------------------------------------------------------------
// Pipeline state
// ---------------------------------------------------------------------------

export interface ChapterState {
  outline: ChapterOutline;
  rawSections: SectionContent[];
  rawSummary: string;
  editedSections: SectionContent[];
  sectionImageDescription: string | null;
  /** Illustration for the chapter's opening section, when images are enabled */
  sectionImagePaths: string[];
}

export function createChapterState(outline: ChapterOutline): ChapterState {
  return {
    outline,
    rawSections: [],
    rawSummary: '',
    editedSections: [],
    sectionImageDescription: null,
    sectionImagePaths: [],
  };
}

export interface EbookState {
  config: EbookConfig;
  outline: EbookOutline | null;
  introductionText: string | null;
  conclusionText: string | null;
  chapters: ChapterState[];
  coverDescription: string | null;
  coverImagePath: string | null;
  pdfPath: string | null;
  docxPath: string | null;
}

export function createEbookState(input: EbookConfigInput): EbookState {
  return {
    config: resolveEbookConfig(input),
    outline: null,
    introductionText: null,
    conclusionText: null,
    chapters: [],
    coverDescription: null,
    coverImagePath: null,
    pdfPath: null,
    docxPath: null,
  };
}
