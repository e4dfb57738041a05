import { describe, expect, it } from 'vitest';
import { formatBrandContext } from './brand-context.js';

describe('formatBrandContext', () => {
  it('writes one line per field in a fixed order', () => {
    const text = formatBrandContext({
      keyValues: 'Sustainability',
      industry: 'Beverages',
      brandTone: 'Casual',
      targetAudience: 'Students',
      brandName: 'Leafy',
    });

    expect(text).toBe([
      'Brand: Leafy',
      'Target Audience: Students',
      'Tone: Casual',
      'Industry: Beverages',
      'Key Values: Sustainability',
    ].join('\n'));
  });

  it('skips empty and whitespace-only fields and trims values', () => {
    expect(formatBrandContext({ brandName: '  Leafy ', industry: '   ', keyValues: '' })).toBe('Brand: Leafy');
  });

  it('returns an empty string without context', () => {
    expect(formatBrandContext()).toBe('');
    expect(formatBrandContext(null)).toBe('');
    expect(formatBrandContext({})).toBe('');
  });

  it('gives the same text for the same context', () => {
    const context = { brandName: 'Leafy', brandTone: 'Friendly' as const };
    expect(formatBrandContext(context)).toBe(formatBrandContext(context));
  });
});
