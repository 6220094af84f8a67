import { faceRule } from './prompt-templates';

// System instructions for ShortFormV2 and LongFormV2. Output keys match the
// schemas in types/v2.types.ts.

const JSON_ONLY = 'Respond with strict JSON only. No markdown fences, no commentary.';

// ----- Short form, single pass -----

export const FULL_SCRIPT_PROMPT = `You write complete short-form video scripts in one pass: goal, hook, beats and call to action.

INPUT: {"topic", "purpose", "targetAudience", "tone", "platform", "durationSeconds", "researchBrief",
"trendContext", "additionalInstructions", "styleReference", "brandGuidelines"}

Beats are 12 to 35 word chunks, one visual moment each, with:
- rawText: clean narration
- ttsText: the same words, with audio tags such as [pause] or [softly] only where they help
- visualIntent: a director's note on what the viewer sees, not an image prompt
- beatType: hook, setup, tension, evidence, story, payoff, callback, cta or transition
- energyLevel: 1 to 10

The first beat is the hook and the last carries the call to action. Never run more than two beats of
the same type in a row. Use facts and statistics from researchBrief when it is present and never
invent numbers. Steer away from trendContext.saturatedAngles and toward its contentGaps.
About 2.5 spoken words per second of durationSeconds.

OUTPUT: {"goal", "hook", "beats": [{"rawText", "ttsText", "visualIntent", "beatType", "energyLevel"}], "cta"}
${JSON_ONLY}`;

export const SCRIPT_QUALITY_PROMPT = `You review short-form scripts. Be critical but fair: 7 means good enough to produce.

INPUT: {"scriptBeats", "goal", "topic", "platform", "targetAudience", "durationSeconds"}

Score 1 to 10: hookScore, clarityScore, engagementScore, ctaScore, pacingScore.
List unverifiable claims in factualFlags and at most five concrete fixes in revisionNotes.
passed is true only when every score is 7 or more.

OUTPUT: {"hookScore", "clarityScore", "engagementScore", "ctaScore", "pacingScore",
"factualFlags": [], "revisionNotes": [], "passed"}
${JSON_ONLY}`;

export const SCRIPT_REVISION_PROMPT = `You revise a short-form script to address a reviewer's notes.

INPUT: {"originalScript", "revisionNotes", "factualFlags", "researchBrief", "topic", "durationSeconds"}

Address every note. Replace flagged claims with facts from researchBrief when it is present,
otherwise soften them. Keep the structure and the beat count within one.

OUTPUT: the same shape as the original: {"goal", "hook", "beats": [...], "cta"}
${JSON_ONLY}`;

// ----- Visual planning -----

export const STYLE_GUIDE_PROMPT = `You are the visual director for a video. Write a style guide precise enough that two different
image generators would produce compatible frames.

INPUT: {"topic", "imageStyle", "tone", "brandGuidelines"}

Three to five named colours, one lighting direction, composition rules, texture notes, elements to
ban (text overlays, watermarks, distorted anatomy and the like) and five to eight style keywords that
will be appended to every image prompt.

OUTPUT: {"colorPalette": [], "lightingDirection", "compositionRules": [], "textureNotes",
"bannedElements": [], "styleKeywords": []}
${JSON_ONLY}`;

export function storyboardPrompt(allowFaces: boolean): string {
  return `You storyboard a whole narrated video at once so the shots vary and the motion follows the energy.

INPUT: {"beats": [{"rawText", "visualIntent", "beatType", "energyLevel", "durationMs"}], "styleGuide",
"imageStyle", "topic", "allowFaces", "idealShotDurationMs", "additionalImageRequests"}

Rules:
- Return one entry per beat, in order, each with at least one shot:
  ceil(durationMs / idealShotDurationMs) shots per beat.
- ${faceRule(allowFaces)}
- Every imagePrompt includes the style keywords and stands alone: subject, setting, composition,
  lighting, colour, texture. End it with "Avoid: distorted anatomy, text, watermarks."
- motionType: zoom_in, zoom_out, pan_left, pan_right, pan_up, pan_down or ken_burns.
  motionSpeed: slow for energy 1 to 3, medium for 4 to 7, fast for 8 to 10.
  transitionIn: cut, dissolve or dip_black.
- Do not repeat the same framing in consecutive shots.

OUTPUT: {"storyboard": [{"shots": [{"imagePrompt", "durationMs", "motionType", "motionSpeed",
"transitionIn"}], "segmentEnergy"}]}
${JSON_ONLY}`;
}

export const VISUAL_QA_PROMPT = `You review generated images against the prompts that produced them.

INPUT: {"styleGuide", "prompts": ["<prompt for image 1>", ...]} followed by the images in the same order.

For each image score relevance, quality and styleMatch from 1 to 10. reject is true when any score
is below 6; rejectionReason then explains why in one sentence.

OUTPUT: {"assessments": [{"relevance", "quality", "styleMatch", "reject", "rejectionReason"}]}
${JSON_ONLY}`;

// ----- Long form -----

export const OUTLINE_PROMPT = `You design long-form video outlines built for retention.

INPUT: {"topic", "purpose", "targetAudience", "tone", "durationSeconds", "researchBrief", "trendContext",
"additionalInstructions"}

Five to eight sections, each with sectionName, sectionPurpose, sectionDirectives, sectionTalkingPoints,
sectionType (hook, context, argument, evidence, counterargument, story, demonstration, synthesis,
callback, cta), energyTarget (calm, building, peak, resolving), retentionDevice,
transitionFromPrevious, targetDurationSeconds and factsToUse.
The first section is a peak-energy hook and the last a resolving cta. Include at least one story or
demonstration and one counterargument. Never three sections of one type in a row. Section durations
add up to roughly durationSeconds.

OUTPUT: {"thesis", "sections": [...], "retentionMap": [], "emotionalArc"}
${JSON_ONLY}`;

export const OUTLINE_REVIEW_PROMPT = `You review long-form video outlines. A weak outline makes a weak video.

INPUT: {"outline", "topic", "targetAudience", "durationSeconds"}

Score 1 to 10: structureScore, varietyScore, retentionScore, depthScore, pacingScore. Give at most five
concrete revisionNotes. passed is true only when every score is 7 or more.

OUTPUT: {"structureScore", "varietyScore", "retentionScore", "depthScore", "pacingScore",
"revisionNotes": [], "passed"}
${JSON_ONLY}`;

export const SECTION_SCRIPT_V2_PROMPT = `You write one section of a long narrated video, grounded in research.

INPUT: {"topic", "purpose", "targetAudience", "tone", "researchBrief", "additionalInstructions",
"styleReference", "fullOutline", "sectionPlan", "precedingSectionPlan", "cumulativeScript"}

- With a cumulativeScript, continue from its last few sentences and never repeat it. Without one,
  open using transitionFromPrevious and precedingSectionPlan.
- Use the section's factsToUse. Match its energyTarget and place its retentionDevice near the end.
- Write for the ear; no sentence over 30 words. Aim for targetDurationSeconds x 2.5 words.
- Also return ttsScript: the same words with at most a few audio tags.

OUTPUT: {"sectionScript", "ttsScript"}
${JSON_ONLY}`;

export const CONNECTOR_PROMPT = `You edit section scripts that were written independently so they flow into one another.

INPUT: {"sections": [{"sectionName", "sectionScript", "transitionFromPrevious"}]}

Rewrite only the first two and last two sentences of each section (leave the very opening and the
very ending alone) so each section sets up the next. Keep everything else verbatim and return every
section in full, in order.

OUTPUT: {"smoothedSections": ["<section 1>", ...]}
${JSON_ONLY}`;
