import { z } from 'zod';

// ---------------------------------------------------------------------------
// Structured-output containers for the first-generation pipelines
// (ShortForm, LongForm). One schema per LLM call.
// ---------------------------------------------------------------------------

export const GoalSchema = z.object({ goal: z.string().min(1) });
export const HookSchema = z.object({ hook: z.string().min(1) });
export const ScriptSchema = z.object({ script: z.string().min(1) });
export const EnhancedScriptSchema = z.object({ enhancedScript: z.string().min(1) });

/** One narration beat; the enhanced text carries TTS audio tags. */
export const ScriptSegmentSchema = z.object({
  scriptSegment: z.string(),
  enhancedScriptSegment: z.string().default(''),
});

export const ScriptListSchema = z.object({
  scriptList: z.array(ScriptSegmentSchema).min(1),
});

export const ImageDescriptionSchema = z.object({
  description: z.string().min(1),
  usesLogo: z.boolean().default(false),
});

export const SegmentImageDescriptionsSchema = z.object({
  segmentImageDescriptions: z.array(ImageDescriptionSchema).min(1),
});

export const SectionStructureSchema = z.object({
  sectionName: z.string(),
  sectionPurpose: z.string(),
  sectionDirectives: z.array(z.string()).default([]),
  sectionTalkingPoints: z.array(z.string()).default([]),
});

export const SectionsStructureSchema = z.object({
  sectionsStructureList: z.array(SectionStructureSchema).min(1),
});

export const SectionScriptSchema = z.object({ sectionScript: z.string().min(1) });

export const SectionSegmentsSchema = z.object({
  segments: z.array(z.string()).min(1),
});

export type ScriptSegment = z.infer<typeof ScriptSegmentSchema>;
export type ImageDescription = z.infer<typeof ImageDescriptionSchema>;
export type SectionStructure = z.infer<typeof SectionStructureSchema>;
