import { Hono } from 'hono';
import { z } from 'zod';
import { toBrandContext, type BrandStore } from '../../services/brands/index.js';
import { CONTENT_TYPE_DEFINITIONS } from '../../services/generation/content-types.js';
import { validateRequest } from '../../services/generation/orchestrator.js';
import {
  BrandContextSchema,
  ContentRequestSchema,
  ContentTypeSchema,
  EditResultSchema,
} from '../../services/generation/schemas.js';
import { CONTENT_TYPES, type BrandContext } from '../../services/generation/types.js';
import { NotFoundError } from '../../utils/errors.js';
import type { ApiServices } from '../index.js';
import { parseBody } from '../validation.js';

const EditBodySchema = z.object({
  original: EditResultSchema,
  instruction: z.string(),
  contentType: ContentTypeSchema,
  brandContext: BrandContextSchema.optional(),
  brandName: z.string().optional(),
});

/** An inline brand context wins over a saved profile name. */
export async function resolveBrandContext(
  brands: BrandStore,
  brandContext?: BrandContext,
  brandName?: string
): Promise<BrandContext | undefined> {
  if (brandContext || !brandName) {
    return brandContext;
  }
  const profile = await brands.get(brandName);
  if (!profile) {
    throw new NotFoundError(`Brand profile '${brandName}' not found`);
  }
  return toBrandContext(profile);
}

export default function studioRoutes(services: ApiServices) {
  const app = new Hono();

  // Available content types
  app.get('/content-types', (c) =>
    c.json(CONTENT_TYPES.map(id => ({ id, label: CONTENT_TYPE_DEFINITIONS[id].label })))
  );

  // Generate content and keep it in history
  app.post('/generate', async (c) => {
    const body = await parseBody(c, ContentRequestSchema);
    const brandContext = await resolveBrandContext(services.brands, body.brandContext, body.brandName);

    const request = validateRequest({
      prompt: body.prompt,
      contentTypes: body.contentTypes,
      platforms: body.platforms,
      brandContext,
      numVariations: body.numVariations,
    });

    const content = await services.generator.generate(request, { signal: c.req.raw.signal });
    const record = await services.history.record(request, content);

    return c.json(record, 201);
  });

  // Edit a variation that is not stored
  app.post('/edit', async (c) => {
    const body = await parseBody(c, EditBodySchema);
    const brandContext = await resolveBrandContext(services.brands, body.brandContext, body.brandName);

    const result = await services.editor.edit(
      body.original,
      body.instruction,
      body.contentType,
      brandContext,
      c.req.raw.signal
    );

    return c.json({ result });
  });

  return app;
}
