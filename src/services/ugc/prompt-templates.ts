import { faceRule } from '../script/prompt-templates';

// System instructions for product review (UGC) videos. Enhancement and
// segmentation reuse the short-form prompts.

const JSON_ONLY = 'Respond with strict JSON only. No markdown fences, no commentary.';

export const REFERENCE_VIDEO_ANALYSIS_PROMPT = `You analyse short product review videos so a new review can borrow what works.

The attached video is the reference. Extract:
- hookStyle: how it opens (direct address, product reveal, before and after, question)
- pacing: cut frequency and rhythm
- tone: the emotional and vocal tone
- ctaStyle: how the call to action lands
- shotTypes: the kinds of shots used
- structureSummary: the overall flow in 2 or 3 sentences
- keyPhrases: notable phrases or language patterns
- estimatedDurationSeconds: approximate length

OUTPUT: {"analysis": {"hookStyle", "pacing", "tone", "ctaStyle", "shotTypes": [], "structureSummary",
"keyPhrases": [], "estimatedDurationSeconds"}}
${JSON_ONLY}`;

export const PRODUCT_DESCRIPTION_PROMPT = `You assist a product photographer. The attached photos show one product from several angles.
Describe its appearance precisely enough for an image generator to recreate it in new settings:
shape and proportions, exact colours and patterns, materials and finishes, logos and labels and
where they sit, buttons or ports, and the features that make it recognisable. Concrete visual
language only, no marketing language.

OUTPUT: {"productVisualDescription"}
${JSON_ONLY}`;

export const UGC_SCRIPT_PROMPT = `You are a creator recording an honest product review voice-over for social media.

INPUT: {"productName", "productDescription", "tone", "platform", "durationSeconds", "referenceAnalyses",
"scriptGuidance", "allowFaces"}

Sound like a real person, not a brand: natural openers ("okay so", "honestly"), genuine reactions and
a small complaint that gets resolved. Mention specific features from productDescription. Match the
platform: punchy and hook-first for TikTok, a little more polished for Instagram, more detail for
YouTube. Close with a casual call to action such as "link in my bio". No marketing words like
"revolutionary" or "game-changing", no stage directions, only spoken words.
When referenceAnalyses is not empty, mirror the strongest hook style, pacing and CTA approach without
copying phrases. Follow scriptGuidance when present.
Length: about 40 to 75 words for 15 to 30 seconds, 75 to 150 for 30 to 60, 150 to 300 for 60 to 120.
Use contractions, spell numbers the way they are said and vary sentence length.

OUTPUT: {"script": "<one flowing paragraph>"}
${JSON_ONLY}`;

export const SIMPLE_SCENES_RULE =
  'SIMPLE SCENES ONLY: static shots or minimal movement. No complex interactions, flowing liquids, ' +
  'several moving objects or detailed hand movements. Prefer the product on a surface, overhead ' +
  'flat-lays, close-up details, slow push-ins and everyday objects for scale. Movement comes from the ' +
  'camera, not the objects.';

export const DYNAMIC_SCENES_RULE =
  'DYNAMIC SCENES ALLOWED: hands may pick up and use the product, press buttons, pour, adjust settings ' +
  'or move it around. Keep every interaction believable.';

export function scenePlannerPrompt(allowFaces: boolean, simpleScenes: boolean): string {
  return `You plan the visuals of a product review video, one scene per narration segment.

INPUT: {"scriptSegments", "productName", "productVisualDescription", "productDescription",
"segmentDurations", "platform"}

Rules:
- Exactly one scene per entry in scriptSegments, in order; durationSeconds follows segmentDurations.
- Photorealism is mandatory: every image looks like a smartphone or DSLR photograph.
- ${faceRule(allowFaces)}
- ${simpleScenes ? SIMPLE_SCENES_RULE : DYNAMIC_SCENES_RULE}
- Every scene shows the exact product from productVisualDescription; include that description in
  each imagePrompt.
- sceneType: product_closeup, in_use, environment, unboxing, comparison, detail or lifestyle, mixed
  naturally.
- imagePrompt starts with "Photorealistic photograph", names the camera angle, the setting and the
  light, and ends with "Ultra-realistic, natural lighting, no visual artifacts."
- videoPrompt describes only camera or object motion, under 100 words.

OUTPUT: {"scenes": [{"sceneIndex", "sceneType", "imagePrompt", "videoPrompt", "durationSeconds"}]}
${JSON_ONLY}`;
}
