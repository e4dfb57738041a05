import { ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { TextModel } from '../ai/types.js';
import { formatBrandContext } from './brand-context.js';
import { CONTENT_TYPE_DEFINITIONS } from './content-types.js';
import { parseImagePrompts } from './parsers.js';
import { renderTemplate, type PromptTemplates } from './templates.js';
import type { BrandContext, ContentType, EditResult } from './types.js';

const logger = createLogger('generation:editor');

export interface ContentEditorDeps {
  model: TextModel;
  templates: PromptTemplates;
}

// Records and lists go to the model as indented JSON, plain text as is
export function renderOriginal(original: EditResult): string {
  return typeof original === 'string' ? original : JSON.stringify(original, null, 2);
}

/** Strips a surrounding markdown code fence and parses the rest as JSON. */
export function parseJsonResponse(text: string): unknown {
  let jsonContent = text.trim();

  if (jsonContent.startsWith('```json')) {
    jsonContent = jsonContent.slice(7);
  } else if (jsonContent.startsWith('```')) {
    jsonContent = jsonContent.slice(3);
  }
  if (jsonContent.endsWith('```')) {
    jsonContent = jsonContent.slice(0, -3);
  }

  try {
    return JSON.parse(jsonContent.trim());
  } catch (error) {
    logger.debug('Edited response is not JSON', { error: String(error) });
    return undefined;
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && Object.values(value).every(v => typeof v === 'string');
}

function hasSameKeys(candidate: Record<string, string>, original: object): boolean {
  const expected = Object.keys(original);
  const actual = Object.keys(candidate);
  return actual.length === expected.length && expected.every(key => key in candidate);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.length > 0 && value.every(v => typeof v === 'string');
}

export class ContentEditor {
  private readonly model: TextModel;
  private readonly templates: PromptTemplates;

  constructor(deps: ContentEditorDeps) {
    this.model = deps.model;
    this.templates = deps.templates;
  }

  /**
   * Rewrites one variation following `instruction`. Model failures are not
   * caught here: the caller keeps showing the previous content.
   */
  async edit(
    original: EditResult,
    instruction: string,
    contentType: ContentType,
    brandContext?: BrandContext,
    signal?: AbortSignal
  ): Promise<EditResult> {
    const trimmedInstruction = instruction.trim();
    if (!trimmedInstruction) {
      throw new ValidationError('Edit instruction must not be empty');
    }

    const definition = CONTENT_TYPE_DEFINITIONS[contentType];
    const prompt = renderTemplate(this.templates.edit, {
      brand_context: formatBrandContext(brandContext),
      original_content: renderOriginal(original),
      content_type: definition.label,
      edit_instruction: trimmedInstruction,
    });

    logger.debug('Editing content', { contentType, instructionLength: trimmedInstruction.length });

    const response = await this.model.call(prompt, signal);
    return this.reconcile(original, response, contentType);
  }

  /** Fits the raw edited text back into the shape of the original. */
  reconcile(original: EditResult, response: string, contentType: ContentType): EditResult {
    if (typeof original === 'string') {
      return response;
    }

    if (Array.isArray(original)) {
      const parsed = parseJsonResponse(response);
      return isStringArray(parsed) ? parsed : parseImagePrompts(response);
    }

    const parsed = parseJsonResponse(response);
    if (isStringRecord(parsed) && hasSameKeys(parsed, original)) {
      return parsed;
    }

    const parseEdited = CONTENT_TYPE_DEFINITIONS[contentType].parseEdited;
    if (parseEdited) {
      return parseEdited(response);
    }

    return { edited_content: response };
  }
}
