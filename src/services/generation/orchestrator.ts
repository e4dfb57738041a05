import { config } from '../../config.js';
import { GenerationCancelledError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { runWithConcurrency } from '../../utils/pool.js';
import type { TextModel } from '../ai/types.js';
import { formatBrandContext } from './brand-context.js';
import { CONTENT_TYPE_DEFINITIONS, contentTypeLabel, type BranchContext } from './content-types.js';
import type { PromptTemplates } from './templates.js';
import type {
  BrandContext,
  ContentRequest,
  ContentType,
  GeneratedContent,
  GenerationProgress,
  PartialGeneratedContent,
  VariationSlot,
} from './types.js';

const logger = createLogger('generation:orchestrator');

export interface NormalizedRequest {
  prompt: string;
  contentTypes: ContentType[];
  platforms: string[];
  brandContext?: BrandContext;
  numVariations: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  concurrency?: number;
  onProgress?: (progress: GenerationProgress) => void;
}

export interface ContentGeneratorDeps {
  model: TextModel;
  templates: PromptTemplates;
  concurrency?: number;
}

interface Branch {
  contentType: ContentType;
  index: number;
}

export function variationErrorMarker(index: number, detail: string): string {
  return `Error generating variation ${index + 1}: ${detail}`;
}

export function validateRequest(request: ContentRequest): NormalizedRequest {
  const issues: string[] = [];

  const prompt = request.prompt?.trim() ?? '';
  if (!prompt) {
    issues.push('Prompt must not be empty');
  }

  const contentTypes = [...new Set(request.contentTypes ?? [])];
  if (contentTypes.length === 0) {
    issues.push('Select at least one content type');
  }

  const numVariations = request.numVariations ?? config.generation.defaultVariations;
  if (!Number.isInteger(numVariations) || numVariations < 1 || numVariations > config.generation.maxVariations) {
    issues.push(`Number of variations must be an integer between 1 and ${config.generation.maxVariations}`);
  }

  if (issues.length > 0) {
    throw new ValidationError(issues.join('; '), issues);
  }

  const platforms = [...new Set((request.platforms ?? []).map(p => p.trim()).filter(Boolean))];

  return {
    prompt,
    contentTypes,
    platforms: platforms.length > 0 ? platforms : [config.generation.defaultPlatform],
    brandContext: request.brandContext,
    numVariations,
  };
}

export class ContentGenerator {
  private readonly model: TextModel;
  private readonly templates: PromptTemplates;
  private readonly concurrency: number;

  constructor(deps: ContentGeneratorDeps) {
    this.model = deps.model;
    this.templates = deps.templates;
    this.concurrency = deps.concurrency ?? config.generation.concurrency;
  }

  /**
   * Produces numVariations variations for every requested content type.
   * A failed variation becomes an inline error marker in its slot; only
   * request validation and cancellation fail the call as a whole.
   */
  async generate(request: ContentRequest, options: GenerateOptions = {}): Promise<GeneratedContent> {
    const normalized = validateRequest(request);
    const { signal, onProgress } = options;

    const slots = new Map<ContentType, Array<VariationSlot | null>>();
    const branches: Branch[] = [];
    for (const contentType of normalized.contentTypes) {
      slots.set(contentType, Array.from({ length: normalized.numVariations }, () => null));
      for (let index = 0; index < normalized.numVariations; index++) {
        branches.push({ contentType, index });
      }
    }

    const ctx: BranchContext = {
      productPrompt: normalized.prompt,
      brandContext: formatBrandContext(normalized.brandContext),
      platforms: normalized.platforms,
      templates: this.templates,
      complete: (prompt) => this.model.call(prompt, signal),
    };

    logger.info('Starting generation', {
      contentTypes: normalized.contentTypes,
      numVariations: normalized.numVariations,
      platforms: normalized.platforms,
      branches: branches.length,
    });

    let completed = 0;
    let failed = 0;

    await runWithConcurrency(
      branches,
      options.concurrency ?? this.concurrency,
      async ({ contentType, index }) => {
        let slot: VariationSlot;
        let ok = true;
        try {
          slot = await CONTENT_TYPE_DEFINITIONS[contentType].produce(ctx);
        } catch (error) {
          if (signal?.aborted) {
            return;
          }
          ok = false;
          failed++;
          logger.warn(`${contentTypeLabel(contentType)} variation ${index + 1} failed`, error);
          slot = variationErrorMarker(index, errorMessage(error));
        }

        const target = slots.get(contentType);
        if (target) {
          target[index] = slot;
        }
        completed++;
        onProgress?.({
          contentType,
          index,
          ok,
          completed,
          total: branches.length,
        });
      },
      signal
    );

    if (signal?.aborted) {
      const partial: PartialGeneratedContent = {};
      for (const [contentType, list] of slots) {
        partial[contentType] = list;
      }
      logger.info('Generation cancelled', { completed, total: branches.length });
      throw new GenerationCancelledError(partial);
    }

    const result: GeneratedContent = {};
    for (const [contentType, list] of slots) {
      result[contentType] = list.map((slot, index) => slot ?? variationErrorMarker(index, 'no result'));
    }

    logger.info('Generation complete', { total: branches.length, failed });
    return result;
  }
}
