import { describe, expect, it } from 'vitest';

import {
  createInMemoryMetadataStore,
  matchesCodePrefix,
  summarizeMetadata,
  type MetadataRecord,
} from '@/modules/classification/index.js';

import { makeMetadataRecords } from '../../fixtures/builders.js';

const cereals: MetadataRecord = {
  code: 'A0111x',
  title: 'Growing of cereals',
  detail: 'Includes grains',
  includes: ['wheat', 'barley'],
  excludes: ['rice'],
};

describe('matchesCodePrefix', () => {
  it('matches shorter and longer numeric codes sharing the prefix', () => {
    expect(matchesCodePrefix(cereals, '01')).toBe(true);
    expect(matchesCodePrefix(cereals, '011')).toBe(true);
    expect(matchesCodePrefix(cereals, '0111')).toBe(true);
    expect(matchesCodePrefix(cereals, '01110')).toBe(true);
  });

  it('does not match a different branch', () => {
    expect(matchesCodePrefix(cereals, '012')).toBe(false);
    expect(matchesCodePrefix(cereals, '31')).toBe(false);
  });

  it('requires at least two compared digits', () => {
    expect(matchesCodePrefix(cereals, '0')).toBe(false);
    expect(matchesCodePrefix({ ...cereals, code: 'Axxxxx' }, '01')).toBe(false);
  });
});

describe('summarizeMetadata', () => {
  it('summarizes classes and divisions by default', () => {
    expect(summarizeMetadata(cereals)).toBe(
      'Code 0111: Growing of cereals. Includes grains. Includes wheat, barley. Excludes rice. '
    );
    expect(
      summarizeMetadata({
        code: 'A01xxx',
        title: 'Crop and animal production',
        detail: '',
        includes: [],
        excludes: [],
      })
    ).toBe('Code 01: Crop and animal production. ');
  });

  it('returns an empty string for other digit counts', () => {
    expect(summarizeMetadata({ ...cereals, code: 'A011xx' })).toBe('');
    expect(summarizeMetadata({ ...cereals, code: 'A011xx' }, [3])).toBe(
      'Code 011: Growing of cereals. Includes grains. Includes wheat, barley. Excludes rice. '
    );
  });
});

describe('createInMemoryMetadataStore', () => {
  const store = createInMemoryMetadataStore(makeMetadataRecords());

  it('keeps records in source order', () => {
    expect(store.size).toBe(15);
    expect(store.entries()[0]?.code).toBe('Cxxxxx');
  });

  it('resolves canonical, unpadded and numeric codes', () => {
    expect(store.getByCode('A0111x')?.title).toBe('Growing of cereals');
    expect(store.getByCode('A0111')?.title).toBe('Growing of cereals');
    expect(store.getByCode('0111')?.title).toBe('Growing of cereals');
    expect(store.getByCode('01')?.title).toBe('Crop and animal production');
    expect(store.getByCode('A')?.title).toBe('Agriculture, forestry and fishing');
  });

  it('resolves a class by its 5-digit form', () => {
    expect(store.getByCode('01700')?.code).toBe('A0170x');
    expect(store.getByCode('31010')?.code).toBe('C3101x');
  });

  it('lets a subclass record own its 5-digit key', () => {
    const subclassStore = createInMemoryMetadataStore([
      { code: 'A01610', title: 'Subclass', detail: '', includes: [], excludes: [] },
      { code: 'A0161x', title: 'Class', detail: '', includes: [], excludes: [] },
    ]);

    expect(subclassStore.getByCode('01610')?.title).toBe('Subclass');
    expect(subclassStore.getByCode('0161')?.title).toBe('Class');
  });

  it('returns null for unknown codes', () => {
    expect(store.getByCode('99')).toBeNull();
    expect(store.getByCode('')).toBeNull();
  });
});
