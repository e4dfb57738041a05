import { asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import { brandProfiles, type AppDatabase, type BrandProfileRow } from '../../db/index.js';
import { NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { BRAND_TONES, type BrandContext, type BrandTone } from '../generation/types.js';

const logger = createLogger('brands');

export interface BrandProfileFields {
  targetAudience?: string;
  brandTone?: BrandTone;
  industry?: string;
  keyValues?: string;
}

export interface BrandProfile extends BrandProfileFields {
  name: string;
  createdAt: string;
  updatedAt: string;
}

export function isBrandTone(value: string): value is BrandTone {
  return BRAND_TONES.some(tone => tone === value);
}

const INVALID_TONE = `Invalid brand tone. Must be one of: ${BRAND_TONES.join(', ')}`;

export const brandProfileFieldsSchema = z.object({
  targetAudience: z.string().optional(),
  brandTone: z.enum(BRAND_TONES, { errorMap: () => ({ message: INVALID_TONE }) }).optional(),
  industry: z.string().optional(),
  keyValues: z.string().optional(),
});

const profileCheckSchema = z.object({
  brandName: z
    .string({ required_error: 'Missing required field: brandName' })
    .trim()
    .min(1, 'Missing required field: brandName'),
  brandTone: z
    .string()
    .refine(tone => tone === '' || isBrandTone(tone), { message: INVALID_TONE })
    .optional(),
});

const importedProfileSchema = brandProfileFieldsSchema.extend({
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

const importFileSchema = z.record(z.string(), importedProfileSchema);

/** Checks a brand form payload; an empty list means it is acceptable. */
export function validateProfile(data: unknown): string[] {
  const result = profileCheckSchema.safeParse(data);
  return result.success ? [] : result.error.issues.map(issue => issue.message);
}

function fromRow(row: BrandProfileRow): BrandProfile {
  const profile: BrandProfile = {
    name: row.name,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
  if (row.targetAudience) profile.targetAudience = row.targetAudience;
  if (row.brandTone && isBrandTone(row.brandTone)) profile.brandTone = row.brandTone;
  if (row.industry) profile.industry = row.industry;
  if (row.keyValues) profile.keyValues = row.keyValues;
  return profile;
}

function columns(fields: BrandProfileFields) {
  return {
    targetAudience: fields.targetAudience ?? null,
    brandTone: fields.brandTone ?? null,
    industry: fields.industry ?? null,
    keyValues: fields.keyValues ?? null,
  };
}

export function toBrandContext(profile: BrandProfile): BrandContext {
  return {
    brandName: profile.name,
    targetAudience: profile.targetAudience,
    brandTone: profile.brandTone,
    industry: profile.industry,
    keyValues: profile.keyValues,
  };
}

export class BrandStore {
  constructor(private readonly db: AppDatabase) {}

  async save(name: string, fields: BrandProfileFields): Promise<BrandProfile> {
    const brandName = name.trim();
    const issues = validateProfile({ brandName, brandTone: fields.brandTone });
    if (issues.length > 0) {
      throw new ValidationError(issues.join('; '), issues);
    }

    const now = new Date().toISOString();
    await this.db
      .insert(brandProfiles)
      .values({ name: brandName, ...columns(fields), createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: brandProfiles.name,
        set: { ...columns(fields), updatedAt: now },
      });

    logger.info('Brand profile saved', { name: brandName });
    return this.require(brandName);
  }

  async get(name: string): Promise<BrandProfile | null> {
    const row = await this.db.query.brandProfiles.findFirst({
      where: eq(brandProfiles.name, name.trim()),
    });
    return row ? fromRow(row) : null;
  }

  async list(): Promise<BrandProfile[]> {
    const rows = await this.db.query.brandProfiles.findMany({
      orderBy: [asc(brandProfiles.name)],
    });
    return rows.map(fromRow);
  }

  async update(name: string, changes: BrandProfileFields): Promise<BrandProfile> {
    const brandName = name.trim();
    const existing = await this.get(brandName);
    if (!existing) {
      throw new NotFoundError(`Brand profile '${brandName}' not found`);
    }

    const merged: BrandProfileFields = {
      targetAudience: existing.targetAudience,
      brandTone: existing.brandTone,
      industry: existing.industry,
      keyValues: existing.keyValues,
      ...changes,
    };

    await this.db
      .update(brandProfiles)
      .set({ ...columns(merged), updatedAt: new Date().toISOString() })
      .where(eq(brandProfiles.name, brandName));

    return this.require(brandName);
  }

  async delete(name: string): Promise<boolean> {
    const brandName = name.trim();
    const result = this.db.delete(brandProfiles).where(eq(brandProfiles.name, brandName)).run();
    if (result.changes > 0) {
      logger.info('Brand profile deleted', { name: brandName });
      return true;
    }
    return false;
  }

  /** Case-insensitive substring match on name, industry or key values. */
  async search(query: string): Promise<BrandProfile[]> {
    const needle = query.trim().toLowerCase();
    const profiles = await this.list();
    return profiles.filter(profile =>
      [profile.name, profile.industry, profile.keyValues]
        .some(value => value !== undefined && value.toLowerCase().includes(needle))
    );
  }

  async summary(name: string): Promise<string | null> {
    const profile = await this.get(name);
    if (!profile) {
      return null;
    }

    const parts = [`Brand: ${profile.name}`];
    if (profile.targetAudience) parts.push(`Audience: ${profile.targetAudience}`);
    if (profile.brandTone) parts.push(`Tone: ${profile.brandTone}`);
    if (profile.industry) parts.push(`Industry: ${profile.industry}`);
    if (profile.keyValues) parts.push(`Values: ${profile.keyValues}`);
    return parts.join(' | ');
  }

  async exportProfiles(): Promise<string> {
    const profiles = await this.list();
    const byName = Object.fromEntries(
      profiles.map(({ name, ...rest }) => [name, rest])
    );
    return JSON.stringify(byName, null, 2);
  }

  /**
   * Loads profiles from an exportProfiles() document. Existing names are
   * skipped unless `overwrite` is set. Returns how many were written.
   */
  async importProfiles(json: string, overwrite = false): Promise<number> {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new ValidationError(`Invalid JSON format: ${errorMessage(error)}`);
    }

    const parsed = importFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );
      throw new ValidationError('Invalid brand profile export', issues);
    }

    let imported = 0;
    for (const [name, entry] of Object.entries(parsed.data)) {
      const brandName = name.trim();
      if (!brandName) {
        continue;
      }
      const now = new Date().toISOString();
      const { createdAt, updatedAt, ...fields } = entry;
      const insert = this.db
        .insert(brandProfiles)
        .values({
          name: brandName,
          ...columns(fields),
          createdAt: createdAt ?? now,
          updatedAt: updatedAt ?? now,
        });
      // Without overwrite an existing row wins, including one saved mid-import
      const result = overwrite
        ? insert
          .onConflictDoUpdate({
            target: brandProfiles.name,
            set: { ...columns(fields), updatedAt: updatedAt ?? now },
          })
          .run()
        : insert.onConflictDoNothing({ target: brandProfiles.name }).run();
      imported += result.changes;
    }

    logger.info('Brand profiles imported', { imported, overwrite });
    return imported;
  }

  private async require(name: string): Promise<BrandProfile> {
    const profile = await this.get(name);
    if (!profile) {
      throw new NotFoundError(`Brand profile '${name}' not found`);
    }
    return profile;
  }
}
