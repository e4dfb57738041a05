export const CONTENT_TYPES = [
  'ad_copy',
  'social_media_captions',
  'email_creative_blocks',
  'video_scripts',
  'image_prompts',
] as const;

export type ContentType = typeof CONTENT_TYPES[number];

export const BRAND_TONES = [
  'Professional',
  'Casual',
  'Humorous',
  'Urgent',
  'Friendly',
  'Authoritative',
  'Gen Z Slang',
] as const;

export type BrandTone = typeof BRAND_TONES[number];

export interface BrandContext {
  brandName?: string;
  targetAudience?: string;
  brandTone?: BrandTone;
  industry?: string;
  keyValues?: string;
}

export interface ContentRequest {
  prompt: string;
  contentTypes: ContentType[];
  platforms?: string[];
  brandContext?: BrandContext;
  numVariations?: number;
}

export interface AdCopy {
  headline: string;
  subtext: string;
  cta: string;
}

/** Platform name → caption, kept exactly as the model wrote it. */
export type SocialCaptions = Record<string, string>;

export interface EmailBlocks {
  subjectLine: string;
  header: string;
  productBlurb: string;
  ctaButton: string;
}

export interface VideoScript {
  hook: string;
  mainContent: string;
  cta: string;
  duration: string;
}

export type ImagePrompts = string[];

export interface VariationByType {
  ad_copy: AdCopy;
  social_media_captions: SocialCaptions;
  email_creative_blocks: EmailBlocks;
  video_scripts: VideoScript;
  image_prompts: ImagePrompts;
}

export type Variation<T extends ContentType = ContentType> = VariationByType[T];

/** A generated variation, or the inline error marker left by a failed branch. */
export type VariationSlot = Variation | string;

/** Keys follow request order; each list holds one slot per variation. */
export type GeneratedContent = Partial<Record<ContentType, VariationSlot[]>>;

/** Same as GeneratedContent, with `null` in slots that never finished. */
export type PartialGeneratedContent = Partial<Record<ContentType, Array<VariationSlot | null>>>;

export interface EditedContent {
  edited_content: string;
}

/** What an edit returns, and therefore also what a later edit may revise. */
export type EditResult = Variation | EditedContent | string;

export interface GenerationProgress {
  contentType: ContentType;
  index: number;
  ok: boolean;
  completed: number;
  total: number;
}

/** Generated content after any number of edits; what history and export work on. */
export type StoredContent = Partial<Record<ContentType, EditResult[]>>;
