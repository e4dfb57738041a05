import type { TextModel } from '../services/ai/types.js';
import type { PromptTemplates } from '../services/generation/templates.js';
import { abortReason } from '../utils/retry.js';

export type Responder = (prompt: string, call: number) => string | Promise<string>;

/** In-process TextModel: records every prompt and answers through `respond`. */
export class FakeModel implements TextModel {
  readonly prompts: string[] = [];

  constructor(private readonly respond: Responder) {}

  async call(prompt: string, signal?: AbortSignal): Promise<string> {
    this.prompts.push(prompt);
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    return this.respond(prompt, this.prompts.length);
  }
}

// Pipe-separated so tests can read the filled-in values back out of a prompt
export const TEST_TEMPLATES: PromptTemplates = {
  ad_copy: 'AD|{brand_context}|{product_prompt}',
  social_caption: 'SOCIAL|{platform}|{product_prompt}',
  email: 'EMAIL|{brand_context}|{product_prompt}',
  video_script: 'VIDEO|{brand_context}|{product_prompt}',
  image_prompt: 'IMAGE|{brand_context}|{product_prompt}',
  edit: 'EDIT|{content_type}|{original_content}|{edit_instruction}|{brand_context}',
};

export const AD_COPY_RESPONSE = 'Headline: Fresh Matcha\nSubtext: Stone-ground energy\nCTA: Shop Now';
