import { Hono } from 'hono';
import { z } from 'zod';
import { brandProfileFieldsSchema } from '../../services/brands/index.js';
import { NotFoundError } from '../../utils/errors.js';
import type { ApiServices } from '../index.js';
import { parseBody } from '../validation.js';

const CreateBrandSchema = brandProfileFieldsSchema.extend({
  brandName: z
    .string({ required_error: 'Missing required field: brandName' })
    .trim()
    .min(1, 'Missing required field: brandName'),
});

const ImportSchema = z.object({
  // An exportProfiles() document, as text or already parsed
  data: z.union([z.string(), z.record(z.string(), z.unknown())]),
  overwrite: z.boolean().optional(),
});

export default function brandRoutes(services: ApiServices) {
  const app = new Hono();
  const { brands } = services;

  // List all brand profiles
  app.get('/', async (c) => c.json(await brands.list()));

  // Create or replace a brand profile
  app.post('/', async (c) => {
    const { brandName, ...fields } = await parseBody(c, CreateBrandSchema);
    const profile = await brands.save(brandName, fields);
    return c.json(profile, 201);
  });

  app.get('/search', async (c) => c.json(await brands.search(c.req.query('q') ?? '')));

  app.get('/export', async (c) =>
    c.body(await brands.exportProfiles(), 200, {
      'Content-Type': 'application/json',
      'Content-Disposition': 'attachment; filename="brand_profiles.json"',
    })
  );

  app.post('/import', async (c) => {
    const body = await parseBody(c, ImportSchema);
    const json = typeof body.data === 'string' ? body.data : JSON.stringify(body.data);
    const imported = await brands.importProfiles(json, body.overwrite ?? false);
    return c.json({ imported });
  });

  // Get single brand profile
  app.get('/:name', async (c) => {
    const name = c.req.param('name');
    const profile = await brands.get(name);
    if (!profile) {
      throw new NotFoundError(`Brand profile '${name}' not found`);
    }
    return c.json(profile);
  });

  app.patch('/:name', async (c) => {
    const changes = await parseBody(c, brandProfileFieldsSchema.strict());
    return c.json(await brands.update(c.req.param('name'), changes));
  });

  app.delete('/:name', async (c) => {
    const name = c.req.param('name');
    if (!(await brands.delete(name))) {
      throw new NotFoundError(`Brand profile '${name}' not found`);
    }
    return c.json({ success: true });
  });

  app.get('/:name/summary', async (c) => {
    const name = c.req.param('name');
    const summary = await brands.summary(name);
    if (summary === null) {
      throw new NotFoundError(`Brand profile '${name}' not found`);
    }
    return c.json({ summary });
  });

  return app;
}
