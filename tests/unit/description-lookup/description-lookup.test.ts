import { describe, expect, it } from 'vitest';

import { createInMemoryMetadataStore } from '@/modules/classification/index.js';
import { createDescriptionLookup } from '@/modules/description-lookup/index.js';

import { makeDescriptionRows, makeMetadataRecords } from '../../fixtures/builders.js';

const metadataStore = createInMemoryMetadataStore(makeMetadataRecords());
const lookup = createDescriptionLookup({ metadataStore }, makeDescriptionRows());

const division01 = metadataStore.getByCode('A01xxx');
const division31 = metadataStore.getByCode('C31xxx');

describe('createDescriptionLookup', () => {
  it('counts source rows', () => {
    expect(lookup.size).toBe(6);
  });

  describe('lookup', () => {
    it('finds an exact description regardless of case', () => {
      const result = lookup.lookup('Gamekeeper');

      expect(result).toEqual({
        description: 'gamekeeper',
        code: '01700',
        codeMeta: metadataStore.getByCode('A0170x'),
        codeDivision: '01',
        codeDivisionMeta: division01,
      });
      expect(result.codeMeta?.title).toBe('Hunting, trapping and related service activities');
    });

    it('pads 4-digit labels to five digits', () => {
      expect(lookup.lookup('rice farmer').code).toBe('01120');
      expect(lookup.lookup('office furniture maker').code).toBe('31010');
    });

    it('returns null metadata for a code without a record', () => {
      const result = lookup.lookup('farmer');

      expect(result.code).toBe('01500');
      expect(result.codeMeta).toBeNull();
      expect(result.codeDivision).toBe('01');
      expect(result.codeDivisionMeta).toBe(division01);
    });

    it('returns nulls for an unknown description', () => {
      const result = lookup.lookup('Astronaut');

      expect(result).toEqual({
        description: 'astronaut',
        code: null,
        codeMeta: null,
        codeDivision: null,
        codeDivisionMeta: null,
      });
      expect('potentialMatches' in result).toBe(false);
    });

    it('lists substring matches when asked', () => {
      const result = lookup.lookup('farmer', { similarity: true });

      expect(result.potentialMatches).toEqual({
        descriptionsCount: 4,
        descriptions: ['wheat farmer', 'rice farmer', 'barley farmer', 'farmer'],
        codesCount: 3,
        codes: ['01110', '01120', '01500'],
        divisionsCount: 1,
        divisions: [{ code: '01', meta: division01 }],
      });
    });

    it('reports no potential matches when they only repeat the exact code', () => {
      const result = lookup.lookup('Gamekeeper', { similarity: true });

      expect(result.code).toBe('01700');
      expect(result.potentialMatches).toEqual({
        descriptionsCount: 0,
        descriptions: [],
        codesCount: 0,
        codes: [],
        divisionsCount: 0,
        divisions: [],
      });
    });

    it('lists matches across divisions without an exact code', () => {
      const result = lookup.lookup('er', { similarity: true });

      expect(result.code).toBeNull();
      expect(result.potentialMatches?.codes).toEqual(['01700', '01110', '01120', '31010', '01500']);
      expect(result.potentialMatches?.divisions).toEqual([
        { code: '01', meta: division01 },
        { code: '31', meta: division31 },
      ]);
    });
  });

  describe('lookupCodeDivision', () => {
    it('returns the division of a code with metadata', () => {
      expect(lookup.lookupCodeDivision('01700')).toEqual({
        codeDivision: '01',
        codeDivisionMeta: division01,
      });
    });

    it('returns nulls for a code without metadata', () => {
      expect(lookup.lookupCodeDivision('01500')).toEqual({
        codeDivision: null,
        codeDivisionMeta: null,
      });
      expect(lookup.lookupCodeDivision('99999')).toEqual({
        codeDivision: null,
        codeDivisionMeta: null,
      });
    });
  });

  describe('uniqueCodeDivisions', () => {
    it('keeps one entry per division in first-seen order', () => {
      const divisions = lookup.uniqueCodeDivisions([
        { code: '01700' },
        { code: '99999' },
        { code: '01120' },
        { code: '31010' },
      ]);

      expect(divisions).toEqual([
        { codeDivision: '01', codeDivisionMeta: division01 },
        { codeDivision: '31', codeDivisionMeta: division31 },
      ]);
    });

    it('returns an empty list without candidates', () => {
      expect(lookup.uniqueCodeDivisions([])).toEqual([]);
    });
  });
});
