import JSZip from 'jszip';
import { slugify } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import { contentTypeLabel, isContentType } from '../generation/content-types.js';
import { DEFAULT_VIDEO_DURATION } from '../generation/parsers.js';
import type { ContentType, EditResult, StoredContent } from '../generation/types.js';

const logger = createLogger('export');

export const EXPORT_FORMATS = ['json', 'text', 'zip', 'klaviyo', 'meta', 'facebook', 'tiktok'] as const;
export type ExportFormat = typeof EXPORT_FORMATS[number];

const RULE = '='.repeat(50);

function entries(content: StoredContent): Array<[ContentType, EditResult[]]> {
  const result: Array<[ContentType, EditResult[]]> = [];
  for (const [type, slots] of Object.entries(content)) {
    if (isContentType(type) && slots) {
      result.push([type, slots]);
    }
  }
  return result;
}

/** Re-keys content by display label, keeping order. */
export function byLabel(content: StoredContent): Record<string, EditResult[]> {
  return Object.fromEntries(entries(content).map(([type, slots]) => [contentTypeLabel(type), slots]));
}

function stringFields(slot: EditResult): Array<[string, string]> | null {
  if (typeof slot === 'string' || Array.isArray(slot)) {
    return null;
  }
  return Object.entries(slot).filter((entry): entry is [string, string] => typeof entry[1] === 'string');
}

function fieldsOf(slot: EditResult): Map<string, string> {
  return new Map(stringFields(slot) ?? []);
}

// subjectLine -> Subject Line, edited_content -> Edited Content; platform names stay as written
export function titleCase(key: string): string {
  if (!/^[a-z]/.test(key)) {
    return key;
  }
  return key
    .replace(/_/g, ' ')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(' ')
    .filter(Boolean)
    .map(word => word[0].toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function formatTimestamp(now: Date): string {
  return now.toISOString().slice(0, 19).replace('T', ' ');
}

function totalVariations(content: StoredContent): number {
  return entries(content).reduce((sum, [, slots]) => sum + slots.length, 0);
}

export function exportAsJson(content: StoredContent, now: Date): string {
  return JSON.stringify(
    {
      export_timestamp: now.toISOString(),
      content: byLabel(content),
      metadata: {
        total_content_types: entries(content).length,
        total_variations: totalVariations(content),
      },
    },
    null,
    2
  );
}

export function exportAsText(content: StoredContent, now: Date): string {
  const lines = ['CONTENT GENERATION EXPORT', RULE, `Generated: ${formatTimestamp(now)}`, ''];

  for (const [type, slots] of entries(content)) {
    const label = contentTypeLabel(type);
    lines.push(`\n${label.toUpperCase()}`);
    lines.push('-'.repeat(label.length));

    slots.forEach((slot, i) => {
      lines.push(`\nVariation ${i + 1}:`);
      if (typeof slot === 'string') {
        lines.push(`  ${slot}`);
      } else if (Array.isArray(slot)) {
        for (const item of slot) {
          lines.push(`    - ${item}`);
        }
      } else {
        for (const [key, value] of stringFields(slot) ?? []) {
          lines.push(`  ${titleCase(key)}: ${value}`);
        }
      }
      lines.push('');
    });
  }

  return lines.join('\n');
}

function variationFile(slot: EditResult): string {
  if (typeof slot === 'string') {
    return slot;
  }
  if (Array.isArray(slot)) {
    return slot.map(item => `- ${item}`).join('\n');
  }
  return (stringFields(slot) ?? []).map(([key, value]) => `${titleCase(key)}: ${value}`).join('\n');
}

function readme(content: StoredContent, now: Date): string {
  const lines = [
    'CONTENT GENERATION EXPORT',
    RULE,
    `Generated: ${formatTimestamp(now)}`,
    '',
    'CONTENTS:',
    '- content_export.json: Complete export in JSON format',
    '- content_export.txt: Formatted text version',
    '- Individual folders for each content type:',
  ];

  for (const [type] of entries(content)) {
    const label = contentTypeLabel(type);
    lines.push(`  - ${slugify(label, '_')}/: ${label} variations`);
  }

  lines.push(
    '',
    'STRUCTURE:',
    'Each content type folder contains:',
    '- variation_X.txt: Individual variation files',
    '- data.json: Structured data for the content type',
    '',
    'USAGE:',
    'Import the JSON files into your marketing tools or',
    'copy text from individual variation files as needed.'
  );

  return lines.join('\n');
}

/**
 * Bundles the JSON and text exports with one folder per content type
 * (variation_<n>.txt files plus data.json) and a README.
 */
export async function exportAsZip(content: StoredContent, now: Date): Promise<ArrayBuffer> {
  const zip = new JSZip();
  const options = { date: now };

  zip.file('content_export.json', exportAsJson(content, now), options);
  zip.file('content_export.txt', exportAsText(content, now), options);

  for (const [type, slots] of entries(content)) {
    const label = contentTypeLabel(type);
    const folder = slugify(label, '_');

    slots.forEach((slot, i) => {
      zip.file(`${folder}/variation_${i + 1}.txt`, variationFile(slot), options);
    });

    zip.file(
      `${folder}/data.json`,
      JSON.stringify({ content_type: label, variations: slots, count: slots.length }, null, 2),
      options
    );
  }

  zip.file('README.txt', readme(content, now), options);

  const archive = await zip.generateAsync({ type: 'arraybuffer', compression: 'DEFLATE' });
  logger.debug('ZIP export built', { bytes: archive.byteLength });
  return archive;
}

// Error markers and other plain strings have no fields to map
function structured(slots: EditResult[] | undefined): Array<Map<string, string>> {
  return (slots ?? []).filter(slot => typeof slot !== 'string' && !Array.isArray(slot)).map(fieldsOf);
}

function exportForKlaviyo(content: StoredContent, now: Date): string {
  const emailTemplates = structured(content.email_creative_blocks).map(fields => ({
    subject_line: fields.get('subjectLine') ?? '',
    header: fields.get('header') ?? '',
    body: fields.get('productBlurb') ?? '',
    cta_text: fields.get('ctaButton') ?? '',
  }));
  return JSON.stringify({ email_templates: emailTemplates, export_timestamp: now.toISOString() }, null, 2);
}

function exportForMeta(content: StoredContent, now: Date): string {
  const adSets = structured(content.ad_copy).map(fields => ({
    headline: fields.get('headline') ?? '',
    description: fields.get('subtext') ?? '',
    call_to_action: fields.get('cta') ?? '',
    format: 'single_image',
  }));
  return JSON.stringify({ ad_sets: adSets, export_timestamp: now.toISOString() }, null, 2);
}

function exportForTikTok(content: StoredContent, now: Date): string {
  const videoAds = structured(content.video_scripts).map(fields => ({
    script: fields.get('mainContent') ?? '',
    hook: fields.get('hook') ?? '',
    cta: fields.get('cta') ?? '',
    duration: fields.get('duration') ?? DEFAULT_VIDEO_DURATION,
  }));
  return JSON.stringify({ video_ads: videoAds, export_timestamp: now.toISOString() }, null, 2);
}

/** Platform-shaped JSON; unknown platforms get the generic JSON export. */
export function exportForPlatform(content: StoredContent, platform: string, now: Date): string {
  switch (platform.trim().toLowerCase()) {
    case 'klaviyo':
      return exportForKlaviyo(content, now);
    case 'meta':
    case 'facebook':
      return exportForMeta(content, now);
    case 'tiktok':
      return exportForTikTok(content, now);
    default:
      return exportAsJson(content, now);
  }
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}
