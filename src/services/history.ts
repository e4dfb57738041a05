import { desc, eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { generations, type AppDatabase, type GenerationRow } from '../db/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { generateId } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';
import { isContentType } from './generation/content-types.js';
import { BrandContextSchema, StoredContentSchema } from './generation/schemas.js';
import type { BrandContext, ContentType, EditResult, StoredContent } from './generation/types.js';

const logger = createLogger('history');

export interface GenerationRecord {
  id: string;
  prompt: string;
  contentTypes: ContentType[];
  platforms: string[];
  brandName: string | null;
  brandContext: BrandContext | null;
  numVariations: number;
  content: StoredContent;
  createdAt: string;
  updatedAt: string;
}

export interface RecordInput {
  prompt: string;
  contentTypes: ContentType[];
  platforms: string[];
  brandContext?: BrandContext;
  numVariations: number;
}

const stringList = z.array(z.string());

function parseJson<T>(raw: string, schema: z.ZodType<T>, column: string, id: string): T {
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Stored ${column} of generation ${id} is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toStoredContent(raw: Record<string, EditResult[]>): StoredContent {
  const content: StoredContent = {};
  for (const [key, slots] of Object.entries(raw)) {
    if (isContentType(key)) {
      content[key] = slots;
    }
  }
  return content;
}

function fromRow(row: GenerationRow): GenerationRecord {
  return {
    id: row.id,
    prompt: row.prompt,
    contentTypes: parseJson(row.contentTypes, stringList, 'content types', row.id).filter(isContentType),
    platforms: parseJson(row.platforms, stringList, 'platforms', row.id),
    brandName: row.brandName,
    brandContext: row.brandContext
      ? parseJson(row.brandContext, BrandContextSchema, 'brand context', row.id)
      : null,
    numVariations: row.numVariations,
    content: toStoredContent(parseJson(row.content, StoredContentSchema, 'content', row.id)),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class GenerationHistory {
  constructor(private readonly db: AppDatabase) {}

  async record(input: RecordInput, content: StoredContent): Promise<GenerationRecord> {
    const id = generateId();
    const now = new Date().toISOString();

    await this.db.insert(generations).values({
      id,
      prompt: input.prompt,
      contentTypes: JSON.stringify(input.contentTypes),
      platforms: JSON.stringify(input.platforms),
      brandName: input.brandContext?.brandName ?? null,
      brandContext: input.brandContext ? JSON.stringify(input.brandContext) : null,
      numVariations: input.numVariations,
      content: JSON.stringify(content),
      createdAt: now,
      updatedAt: now,
    });

    logger.debug('Generation recorded', { id });
    return this.require(id);
  }

  /** Most recent first. */
  async list(limit = 20): Promise<GenerationRecord[]> {
    const rows = await this.db.query.generations.findMany({
      orderBy: [desc(generations.createdAt), desc(sql`rowid`)],
      limit,
    });
    return rows.map(fromRow);
  }

  async get(id: string): Promise<GenerationRecord | null> {
    const row = await this.db.query.generations.findFirst({
      where: eq(generations.id, id),
    });
    return row ? fromRow(row) : null;
  }

  async replaceVariation(
    id: string,
    contentType: ContentType,
    index: number,
    value: EditResult
  ): Promise<GenerationRecord> {
    const existing = await this.require(id);
    const slots = existing.content[contentType];
    if (!slots) {
      throw new ValidationError(`Generation ${id} has no ${contentType} content`);
    }
    if (!Number.isInteger(index) || index < 0 || index >= slots.length) {
      throw new ValidationError(`Variation index ${index} is out of range (0-${slots.length - 1})`);
    }

    const content: StoredContent = {
      ...existing.content,
      [contentType]: slots.map((slot, i) => (i === index ? value : slot)),
    };

    await this.db
      .update(generations)
      .set({ content: JSON.stringify(content), updatedAt: new Date().toISOString() })
      .where(eq(generations.id, id));

    logger.info('Variation replaced', { id, contentType, index });
    return this.require(id);
  }

  private async require(id: string): Promise<GenerationRecord> {
    const record = await this.get(id);
    if (!record) {
      throw new NotFoundError(`Generation ${id} not found`);
    }
    return record;
  }
}
