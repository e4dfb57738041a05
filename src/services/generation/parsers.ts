import type { AdCopy, EmailBlocks, ImagePrompts, VideoScript } from './types.js';

export const DEFAULT_VIDEO_DURATION = '30-60 seconds';

const PLACEHOLDER_SUBTEXT = 'Compelling subtext for your product';
const PLACEHOLDER_CTA = 'Learn More';
const HEADLINE_PREVIEW_LENGTH = 100;
const MAX_IMAGE_PROMPTS = 3;
const MIN_IMAGE_PROMPT_LENGTH = 10;

// "Headline: ...", tolerating markdown emphasis around the label ("**CTA:** ...")
const LABEL_LINE = /^[*_#\s]*([A-Za-z][A-Za-z ]*?)[*_]*\s*:[*_]*\s*(.*)$/;
const BLANK_LINE = /\r?\n[ \t\r]*\n/;
const LIST_MARKER = /^[\d.\-•\s]+/;

const AD_COPY_LABELS = new Map<string, keyof AdCopy>([
  ['headline', 'headline'],
  ['subtext', 'subtext'],
  ['cta', 'cta'],
]);

const EMAIL_LABELS = new Map<string, keyof EmailBlocks>([
  ['subject', 'subjectLine'],
  ['header', 'header'],
  ['product', 'productBlurb'],
  ['cta', 'ctaButton'],
]);

/**
 * Labelled-line protocol: a line opening with a known label starts that
 * field, and following non-empty lines without a known label are appended
 * to it with a single space. Lines before the first label are ignored.
 */
export function parseLabeledLines<K extends string>(
  text: string,
  labels: ReadonlyMap<string, K>
): Map<K, string> {
  const fields = new Map<K, string>();
  let current: K | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const match = LABEL_LINE.exec(line);
    const field = match ? labels.get(match[1].trim().toLowerCase()) : undefined;

    if (match && field !== undefined) {
      current = field;
      fields.set(field, match[2].trim());
    } else if (current !== null) {
      const value = fields.get(current);
      fields.set(current, value ? `${value} ${line}` : line);
    }
  }

  return fields;
}

export function splitBlocks(text: string): string[] {
  return text
    .split(BLANK_LINE)
    .map(block => block.trim())
    .filter(block => block.length > 0);
}

export function parseAdCopy(response: string): AdCopy {
  const fields = parseLabeledLines(response, AD_COPY_LABELS);
  const adCopy: AdCopy = {
    headline: fields.get('headline') ?? '',
    subtext: fields.get('subtext') ?? '',
    cta: fields.get('cta') ?? '',
  };

  if (adCopy.headline || adCopy.subtext || adCopy.cta) {
    return adCopy;
  }

  const paragraphs = splitBlocks(response);
  if (paragraphs.length >= 3) {
    return {
      headline: paragraphs[0],
      subtext: paragraphs[1],
      cta: paragraphs[2],
    };
  }

  return {
    // By code point, not UTF-16 unit
    headline: Array.from(response.trim()).slice(0, HEADLINE_PREVIEW_LENGTH).join('') + '...',
    subtext: PLACEHOLDER_SUBTEXT,
    cta: PLACEHOLDER_CTA,
  };
}

export function parseEmailBlocks(response: string): EmailBlocks {
  const fields = parseLabeledLines(response, EMAIL_LABELS);
  return {
    subjectLine: fields.get('subjectLine') ?? '',
    header: fields.get('header') ?? '',
    productBlurb: fields.get('productBlurb') ?? '',
    ctaButton: fields.get('ctaButton') ?? '',
  };
}

export function parseVideoScript(response: string): VideoScript {
  const blocks = splitBlocks(response);

  if (blocks.length >= 3) {
    return {
      hook: blocks[0],
      mainContent: blocks[1],
      cta: blocks[2],
      duration: DEFAULT_VIDEO_DURATION,
    };
  }

  return {
    hook: '',
    mainContent: response,
    cta: '',
    duration: DEFAULT_VIDEO_DURATION,
  };
}

export function parseImagePrompts(response: string): ImagePrompts {
  const prompts = response
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .map(line => line.replace(LIST_MARKER, '').trim())
    .filter(line => line.length > MIN_IMAGE_PROMPT_LENGTH)
    .slice(0, MAX_IMAGE_PROMPTS);

  return prompts.length > 0 ? prompts : [response];
}
