import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

// Brand profiles - reusable brand context, keyed by brand name
export const brandProfiles = sqliteTable('brand_profiles', {
  name: text('name').primaryKey(),
  targetAudience: text('target_audience'),
  brandTone: text('brand_tone'), // BrandTone
  industry: text('industry'),
  keyValues: text('key_values'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// Generations - past requests and their (possibly edited) results
export const generations = sqliteTable('generations', {
  id: text('id').primaryKey(),
  prompt: text('prompt').notNull(),
  contentTypes: text('content_types').notNull(), // JSON array of ContentType
  platforms: text('platforms').notNull(), // JSON array
  brandName: text('brand_name'),
  brandContext: text('brand_context'), // JSON BrandContext
  numVariations: integer('num_variations').notNull(),
  content: text('content').notNull(), // JSON GeneratedContent
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export type BrandProfileRow = typeof brandProfiles.$inferSelect;
export type NewBrandProfileRow = typeof brandProfiles.$inferInsert;
export type GenerationRow = typeof generations.$inferSelect;
export type NewGenerationRow = typeof generations.$inferInsert;
