import { randomUUID } from 'crypto';

export function generateId(): string {
  return randomUUID();
}

export function slugify(text: string, separator = '-'): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, separator)
    .replace(new RegExp(`^\\${separator}+|\\${separator}+$`, 'g'), '');
}
