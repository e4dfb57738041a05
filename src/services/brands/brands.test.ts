import { beforeEach, describe, expect, it } from 'vitest';
import { createDatabase } from '../../db/index.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { BrandStore, toBrandContext, validateProfile } from './index.js';

const INVALID_TONE = 'Invalid brand tone. Must be one of: Professional, Casual, Humorous, Urgent, Friendly, Authoritative, Gen Z Slang';

describe('validateProfile', () => {
  it('requires a brand name', () => {
    expect(validateProfile({})).toEqual(['Missing required field: brandName']);
    expect(validateProfile({ brandName: '   ' })).toEqual(['Missing required field: brandName']);
  });

  it('only accepts known tones', () => {
    expect(validateProfile({ brandName: 'Leafy', brandTone: 'Sarcastic' })).toEqual([INVALID_TONE]);
    expect(validateProfile({ brandName: 'Leafy', brandTone: 'Gen Z Slang' })).toEqual([]);
    expect(validateProfile({ brandName: 'Leafy', brandTone: '' })).toEqual([]);
  });
});

describe('BrandStore', () => {
  let store: BrandStore;

  beforeEach(() => {
    store = new BrandStore(createDatabase(':memory:'));
  });

  it('saves and reads back a profile', async () => {
    await store.save('Leafy', { brandTone: 'Casual', industry: 'Beverages' });

    const profile = await store.get('Leafy');
    expect(profile).toMatchObject({ name: 'Leafy', brandTone: 'Casual', industry: 'Beverages' });
    expect(profile).not.toHaveProperty('targetAudience');
    expect(await store.get('Unknown')).toBeNull();
  });

  it('keeps the creation time when a profile is saved again', async () => {
    const first = await store.save('Leafy', { industry: 'Beverages' });
    const second = await store.save('Leafy', { industry: 'Tea' });

    expect(second.createdAt).toBe(first.createdAt);
    expect(second.industry).toBe('Tea');
    expect(await store.list()).toHaveLength(1);
  });

  it('rejects a blank name', async () => {
    await expect(store.save('  ', { industry: 'Tea' })).rejects.toThrow(ValidationError);
  });

  it('lists profiles by name', async () => {
    await store.save('Zest', {});
    await store.save('Aurora', {});

    expect((await store.list()).map(p => p.name)).toEqual(['Aurora', 'Zest']);
  });

  it('merges updates into an existing profile', async () => {
    await store.save('Leafy', { brandTone: 'Casual', industry: 'Beverages' });

    const updated = await store.update('Leafy', { industry: 'Tea', keyValues: 'Calm' });

    expect(updated).toMatchObject({ brandTone: 'Casual', industry: 'Tea', keyValues: 'Calm' });
    await expect(store.update('Missing', { industry: 'Tea' })).rejects.toThrow(NotFoundError);
  });

  it('reports whether a delete removed anything', async () => {
    await store.save('Leafy', {});

    expect(await store.delete('Leafy')).toBe(true);
    expect(await store.delete('Leafy')).toBe(false);
  });

  it('searches name, industry and key values case-insensitively', async () => {
    await store.save('Leafy', { industry: 'Beverages', keyValues: 'Sustainability' });
    await store.save('Boltwear', { industry: 'Apparel', keyValues: 'Speed, durability' });

    expect((await store.search('bev')).map(p => p.name)).toEqual(['Leafy']);
    expect((await store.search('DURA')).map(p => p.name)).toEqual(['Boltwear']);
    expect((await store.search('bolt')).map(p => p.name)).toEqual(['Boltwear']);
    expect(await store.search('nothing')).toEqual([]);
  });

  it('summarises a profile on one line', async () => {
    await store.save('Leafy', {
      targetAudience: 'Students',
      brandTone: 'Casual',
      industry: 'Beverages',
      keyValues: 'Sustainability',
    });
    await store.save('Bare', {});

    expect(await store.summary('Leafy'))
      .toBe('Brand: Leafy | Audience: Students | Tone: Casual | Industry: Beverages | Values: Sustainability');
    expect(await store.summary('Bare')).toBe('Brand: Bare');
    expect(await store.summary('Missing')).toBeNull();
  });

  it('round-trips profiles through export and import', async () => {
    await store.save('Leafy', { industry: 'Beverages' });
    await store.save('Boltwear', { brandTone: 'Urgent' });
    const exported = await store.exportProfiles();
    const original = await store.get('Leafy');

    const other = new BrandStore(createDatabase(':memory:'));
    expect(await other.importProfiles(exported)).toBe(2);
    expect(await other.importProfiles(exported)).toBe(0);
    expect(await other.importProfiles(exported, true)).toBe(2);

    const imported = await other.get('Leafy');
    expect(imported).toMatchObject({ name: 'Leafy', industry: 'Beverages', createdAt: original?.createdAt });
    expect(await other.get('Boltwear')).toMatchObject({ brandTone: 'Urgent' });
  });

  it('leaves existing profiles untouched when importing without overwrite', async () => {
    await store.save('Leafy', { industry: 'Tea', brandTone: 'Casual' });
    const document = JSON.stringify({
      Leafy: { industry: 'Coffee' },
      Boltwear: { industry: 'Apparel' },
    });

    expect(await store.importProfiles(document)).toBe(1);
    expect(await store.get('Leafy')).toMatchObject({ industry: 'Tea', brandTone: 'Casual' });
    expect(await store.get('Boltwear')).toMatchObject({ industry: 'Apparel' });

    expect(await store.importProfiles(document, true)).toBe(2);
    expect(await store.get('Leafy')).toMatchObject({ industry: 'Coffee' });
  });

  it('trims names on every lookup', async () => {
    await store.save(' Leafy ', { industry: 'Tea' });

    expect(await store.get(' Leafy')).toMatchObject({ name: 'Leafy', industry: 'Tea' });
    expect(await store.update('Leafy ', { keyValues: 'Calm' })).toMatchObject({ name: 'Leafy', keyValues: 'Calm' });
    expect(await store.summary('  Leafy')).toBe('Brand: Leafy | Industry: Tea | Values: Calm');
    expect(await store.delete(' Leafy ')).toBe(true);
    expect(await store.get('Leafy')).toBeNull();
  });

  it('rejects import documents that are not valid', async () => {
    await expect(store.importProfiles('{not json')).rejects.toThrow(ValidationError);
    await expect(store.importProfiles('{"Leafy": {"brandTone": "Sarcastic"}}')).rejects.toThrow(ValidationError);
    await expect(store.importProfiles('[1, 2]')).rejects.toThrow(ValidationError);
  });
});

describe('toBrandContext', () => {
  it('uses the profile name as the brand name', () => {
    expect(toBrandContext({
      name: 'Leafy',
      brandTone: 'Casual',
      createdAt: '2024-05-01T10:00:00.000Z',
      updatedAt: '2024-05-01T10:00:00.000Z',
    })).toEqual({ brandName: 'Leafy', brandTone: 'Casual' });
  });
});
