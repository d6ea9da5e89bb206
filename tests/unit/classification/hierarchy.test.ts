import { describe, expect, it } from 'vitest';

import {
  buildHierarchy,
  createInMemoryMetadataStore,
  type LeafText,
} from '@/modules/classification/index.js';

import {
  makeActivityRows,
  makeMetadataRecords,
  makeStructureRows,
} from '../../fixtures/builders.js';

const hierarchy = buildHierarchy(
  { metadataStore: createInMemoryMetadataStore(makeMetadataRecords()) },
  { structure: makeStructureRows(), activities: makeActivityRows() }
)._unsafeUnwrap();

const toPairs = (entries: Iterable<LeafText>) =>
  [...entries].map((entry) => `${entry.code.formatted} ${entry.text}`);

describe('Hierarchy', () => {
  it('iterates nodes in code order', () => {
    expect(hierarchy.size).toBe(15);
    expect([...hierarchy].map((node) => node.code.unpadded)).toEqual([
      'A',
      'A01',
      'A011',
      'A0111',
      'A0112',
      'A016',
      'A0161',
      'A01611',
      'A01619',
      'A017',
      'A0170',
      'C',
      'C31',
      'C310',
      'C3101',
    ]);
    expect(hierarchy.nodes).toHaveLength(15);
  });

  it('reports membership by any spelling', () => {
    expect(hierarchy.has('31.01')).toBe(true);
    expect(hierarchy.has('31010')).toBe(true);
    expect(hierarchy.has('32')).toBe(false);
  });

  describe('allLeafDescriptions', () => {
    it('yields leaf descriptions in code order', () => {
      expect(toPairs(hierarchy.allLeafDescriptions())).toEqual([
        '01.11 Growing of cereals',
        '01.12 Growing of rice',
        '01.61/1 Crop spraying',
        '01.61/9 Other crop support',
        '01.70 Hunting, trapping and related service activities',
        '31.01 Manufacture of office and shop furniture',
      ]);
    });

    it('can be iterated more than once', () => {
      const descriptions = hierarchy.allLeafDescriptions();
      expect(toPairs(descriptions)).toEqual(toPairs(descriptions));
      expect(toPairs(descriptions)).toHaveLength(6);
    });
  });

  describe('allLeafActivities', () => {
    it('skips activities attached to inner nodes', () => {
      expect(toPairs(hierarchy.allLeafActivities())).toEqual([
        '01.11 Barley growing',
        '01.11 Wheat growing',
        '01.11 Growing of cereals',
        '01.12 Rice growing',
        '01.61/1 Crop spraying by aircraft',
        '01.70 Gamekeeping',
        '31.01 Office furniture manufacture',
      ]);
    });

    it('can be iterated more than once', () => {
      const activities = hierarchy.allLeafActivities();
      expect([...activities]).toHaveLength(7);
      expect([...activities]).toHaveLength(7);
    });
  });

  describe('allLeafText', () => {
    it('merges descriptions and activities without duplicates', () => {
      expect(hierarchy.allLeafText()).toEqual([
        { code: '01.11', text: 'Growing of cereals' },
        { code: '01.11', text: 'Barley growing' },
        { code: '01.11', text: 'Wheat growing' },
        { code: '01.12', text: 'Growing of rice' },
        { code: '01.12', text: 'Rice growing' },
        { code: '01.61/1', text: 'Crop spraying' },
        { code: '01.61/1', text: 'Crop spraying by aircraft' },
        { code: '01.61/9', text: 'Other crop support' },
        { code: '01.70', text: 'Hunting, trapping and related service activities' },
        { code: '01.70', text: 'Gamekeeping' },
        { code: '31.01', text: 'Manufacture of office and shop furniture' },
        { code: '31.01', text: 'Office furniture manufacture' },
      ]);
    });
  });
});
