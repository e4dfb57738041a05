import { renderTemplate, type PromptTemplates, type TemplateName } from './templates.js';
import { parseAdCopy, parseEmailBlocks, parseImagePrompts, parseVideoScript } from './parsers.js';
import { CONTENT_TYPES, type ContentType, type SocialCaptions, type Variation } from './types.js';

/** Everything one (content type, variation) branch needs to produce its variation. */
export interface BranchContext {
  productPrompt: string;
  brandContext: string;
  platforms: string[];
  templates: PromptTemplates;
  complete: (prompt: string) => Promise<string>;
}

export interface ContentTypeDefinition<T extends ContentType> {
  label: string;
  template: TemplateName;
  produce: (ctx: BranchContext) => Promise<Variation<T>>;
  /** Re-reads an edited response when it did not come back as JSON. */
  parseEdited?: (response: string) => Variation<T>;
}

function singlePrompt<V extends Variation>(
  template: TemplateName,
  parse: (response: string) => V
): (ctx: BranchContext) => Promise<V> {
  return async (ctx) => {
    const prompt = renderTemplate(ctx.templates[template], {
      brand_context: ctx.brandContext,
      product_prompt: ctx.productPrompt,
    });
    return parse(await ctx.complete(prompt));
  };
}

// One call per platform; the captions are kept verbatim
function perPlatform(template: TemplateName): (ctx: BranchContext) => Promise<SocialCaptions> {
  return async (ctx) => {
    const captions: SocialCaptions = {};
    for (const platform of ctx.platforms) {
      const prompt = renderTemplate(ctx.templates[template], {
        brand_context: ctx.brandContext,
        product_prompt: ctx.productPrompt,
        platform,
      });
      captions[platform] = await ctx.complete(prompt);
    }
    return captions;
  };
}

export const CONTENT_TYPE_DEFINITIONS: { [T in ContentType]: ContentTypeDefinition<T> } = {
  ad_copy: {
    label: 'Ad Copy',
    template: 'ad_copy',
    produce: singlePrompt('ad_copy', parseAdCopy),
    parseEdited: parseAdCopy,
  },
  social_media_captions: {
    label: 'Social Media Captions',
    template: 'social_caption',
    produce: perPlatform('social_caption'),
  },
  email_creative_blocks: {
    label: 'Email Creative Blocks',
    template: 'email',
    produce: singlePrompt('email', parseEmailBlocks),
    parseEdited: parseEmailBlocks,
  },
  video_scripts: {
    label: 'Video Scripts',
    template: 'video_script',
    produce: singlePrompt('video_script', parseVideoScript),
  },
  image_prompts: {
    label: 'Image Prompts',
    template: 'image_prompt',
    produce: singlePrompt('image_prompt', parseImagePrompts),
  },
};

export function contentTypeLabel(type: ContentType): string {
  return CONTENT_TYPE_DEFINITIONS[type].label;
}

/** Accepts an id ("ad_copy") or a display label ("Ad Copy"), case-insensitively. */
export function resolveContentType(value: string): ContentType | null {
  const normalized = value.trim().toLowerCase();
  return CONTENT_TYPES.find(type =>
    type === normalized || CONTENT_TYPE_DEFINITIONS[type].label.toLowerCase() === normalized
  ) ?? null;
}

export function isContentType(value: string): value is ContentType {
  return CONTENT_TYPES.some(type => type === value);
}
