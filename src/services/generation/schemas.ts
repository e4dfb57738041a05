import { z } from 'zod';
import { resolveContentType } from './content-types.js';
import { BRAND_TONES, type ContentType, type EditResult } from './types.js';

export const BrandToneEnum = z.enum(BRAND_TONES);

export const BrandContextSchema = z.object({
  brandName: z.string().optional(),
  targetAudience: z.string().optional(),
  brandTone: BrandToneEnum.optional(),
  industry: z.string().optional(),
  keyValues: z.string().optional(),
});

// Takes an id ("ad_copy") or a label ("Ad Copy")
export const ContentTypeSchema = z.string().transform((value, ctx): ContentType => {
  const type = resolveContentType(value);
  if (!type) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown content type: ${value}`,
    });
    return z.NEVER;
  }
  return type;
});

export const ContentRequestSchema = z.object({
  prompt: z.string(),
  contentTypes: z.array(ContentTypeSchema),
  platforms: z.array(z.string()).optional(),
  brandContext: BrandContextSchema.optional(),
  /** Name of a saved brand profile, used when no brandContext is given. */
  brandName: z.string().optional(),
  numVariations: z.number().int().optional(),
});

export const EditResultSchema: z.ZodType<EditResult> = z.union([
  z.string(),
  z.array(z.string()),
  z.record(z.string(), z.string()),
]);

export const StoredContentSchema = z.record(z.string(), z.array(EditResultSchema));

