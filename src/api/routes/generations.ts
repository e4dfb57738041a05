import { Hono } from 'hono';
import { z } from 'zod';
import {
  exportAsJson,
  exportAsText,
  exportAsZip,
  exportForPlatform,
  isExportFormat,
  EXPORT_FORMATS,
} from '../../services/export/index.js';
import { ContentTypeSchema } from '../../services/generation/schemas.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import type { ApiServices } from '../index.js';
import { parseBody } from '../validation.js';

const EditVariationSchema = z.object({
  contentType: ContentTypeSchema,
  index: z.number().int().min(0),
  instruction: z.string(),
});

const MAX_LIST_LIMIT = 100;

export default function generationRoutes(services: ApiServices) {
  const app = new Hono();
  const now = services.now ?? (() => new Date());

  async function requireGeneration(id: string) {
    const record = await services.history.get(id);
    if (!record) {
      throw new NotFoundError('Generation not found');
    }
    return record;
  }

  // List past generations, newest first
  app.get('/', async (c) => {
    const limit = Number.parseInt(c.req.query('limit') ?? '20', 10);
    const records = await services.history.list(
      Number.isNaN(limit) ? 20 : Math.min(Math.max(limit, 1), MAX_LIST_LIMIT)
    );
    return c.json(records);
  });

  // Get single generation
  app.get('/:id', async (c) => c.json(await requireGeneration(c.req.param('id'))));

  // Edit one stored variation in place. A failed model call leaves it untouched.
  app.post('/:id/edit', async (c) => {
    const id = c.req.param('id');
    const body = await parseBody(c, EditVariationSchema);
    const record = await requireGeneration(id);

    const slots = record.content[body.contentType];
    if (!slots) {
      throw new ValidationError(`Generation has no ${body.contentType} content`);
    }
    if (body.index >= slots.length) {
      throw new ValidationError(`Variation index ${body.index} is out of range (0-${slots.length - 1})`);
    }

    const result = await services.editor.edit(
      slots[body.index],
      body.instruction,
      body.contentType,
      record.brandContext ?? undefined,
      c.req.raw.signal
    );

    const updated = await services.history.replaceVariation(id, body.contentType, body.index, result);
    return c.json({ result, generation: updated });
  });

  // Download in one of the export formats
  app.get('/:id/export', async (c) => {
    const record = await requireGeneration(c.req.param('id'));
    const format = (c.req.query('format') ?? 'json').toLowerCase();
    if (!isExportFormat(format)) {
      throw new ValidationError(`Unknown export format: ${format}`, [
        `format must be one of: ${EXPORT_FORMATS.join(', ')}`,
      ]);
    }

    const timestamp = now();
    const baseName = `content_export_${record.id}`;

    switch (format) {
      case 'json':
        return c.body(exportAsJson(record.content, timestamp), 200, {
          'Content-Type': 'application/json',
          'Content-Disposition': `attachment; filename="${baseName}.json"`,
        });
      case 'text':
        return c.body(exportAsText(record.content, timestamp), 200, {
          'Content-Type': 'text/plain; charset=utf-8',
          'Content-Disposition': `attachment; filename="${baseName}.txt"`,
        });
      case 'zip':
        return c.body(await exportAsZip(record.content, timestamp), 200, {
          'Content-Type': 'application/zip',
          'Content-Disposition': `attachment; filename="${baseName}.zip"`,
        });
      default:
        return c.body(exportForPlatform(record.content, format, timestamp), 200, {
          'Content-Type': 'application/json',
          'Content-Disposition': `attachment; filename="${baseName}_${format}.json"`,
        });
    }
  });

  return app;
}
