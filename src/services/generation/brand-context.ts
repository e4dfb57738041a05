import type { BrandContext } from './types.js';

const BRAND_FIELDS: Array<[keyof BrandContext, string]> = [
  ['brandName', 'Brand'],
  ['targetAudience', 'Target Audience'],
  ['brandTone', 'Tone'],
  ['industry', 'Industry'],
  ['keyValues', 'Key Values'],
];

// One "Label: value" line per non-empty field, in a fixed order
export function formatBrandContext(context?: BrandContext | null): string {
  if (!context) {
    return '';
  }

  return BRAND_FIELDS
    .filter(([key]) => Boolean(context[key]?.trim()))
    .map(([key, label]) => `${label}: ${context[key]?.trim()}`)
    .join('\n');
}
