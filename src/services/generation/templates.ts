import { readFileSync } from 'fs';
import { join } from 'path';
import { config } from '../../config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('generation:templates');

export const TEMPLATE_NAMES = [
  'ad_copy',
  'social_caption',
  'email',
  'video_script',
  'image_prompt',
  'edit',
] as const;

export type TemplateName = typeof TEMPLATE_NAMES[number];

export type PromptTemplates = Record<TemplateName, string>;

export type TemplateValues = Partial<Record<
  'brand_context' | 'product_prompt' | 'platform' | 'content_type' | 'original_content' | 'edit_instruction',
  string
>>;

const PLACEHOLDER = /\{(brand_context|product_prompt|platform|content_type|original_content|edit_instruction)\}/g;

function templateFile(name: TemplateName): string {
  return name.replace(/_/g, '-') + '.md';
}

export function loadTemplates(dir: string = config.paths.templates): PromptTemplates {
  const read = (name: TemplateName): string => {
    const path = join(dir, templateFile(name));
    try {
      return readFileSync(path, 'utf-8').trim();
    } catch (error) {
      throw new ConfigurationError(`Prompt template "${name}" could not be read from ${path}: ${error}`);
    }
  };

  const templates: PromptTemplates = {
    ad_copy: read('ad_copy'),
    social_caption: read('social_caption'),
    email: read('email'),
    video_script: read('video_script'),
    image_prompt: read('image_prompt'),
    edit: read('edit'),
  };

  logger.debug('Prompt templates loaded', { dir, count: TEMPLATE_NAMES.length });
  return templates;
}

/**
 * Fills the known placeholders. Placeholders without a value and any other
 * braces in the template are left as they are.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match, key: keyof TemplateValues) => values[key] ?? match);
}
