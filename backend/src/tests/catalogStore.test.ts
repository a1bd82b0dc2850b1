import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CatalogStore, keywordTerms } from '../retrieval/catalogStore.js';
import type { PartRow } from '../retrieval/catalogStore.js';

const part = (overrides: Partial<PartRow>): PartRow => ({
  part_name: null,
  part_id: null,
  mpn_id: null,
  part_price: null,
  install_difficulty: null,
  install_time: null,
  symptoms: null,
  appliance_types: null,
  replace_parts: null,
  brand: null,
  availability: null,
  install_video_url: null,
  product_url: null,
  ...overrides
});

const fixtures: PartRow[] = [
  part({
    part_name: 'Refrigerator Water Inlet Valve',
    part_id: 'PS11752778',
    mpn_id: 'WPW10408179',
    part_price: 39.5,
    install_difficulty: 'Easy',
    symptoms: 'Leaking | Ice maker not making ice',
    appliance_types: 'Refrigerator',
    replace_parts: 'W10408179, AP6020238',
    brand: 'Whirlpool',
    availability: 'In Stock'
  }),
  part({
    part_name: 'Dishwasher Drain Pump',
    part_id: 'PS3406971',
    mpn_id: 'W10348269',
    part_price: 54.95,
    symptoms: 'Will not drain | Leaking | Noisy',
    appliance_types: 'Dishwasher',
    brand: 'Whirlpool'
  }),
  part({
    part_name: 'Refrigerator Door Gasket',
    part_id: 'PS2000001',
    symptoms: 'Door sweating | Leaking',
    appliance_types: 'Refrigerator',
    brand: 'GE'
  })
];

describe('CatalogStore', () => {
  let store: CatalogStore;

  beforeEach(() => {
    store = new CatalogStore(':memory:');
    store.insertParts(fixtures);
  });

  afterEach(() => {
    store.close();
  });

  it('finds a part by catalog number regardless of case', () => {
    const rows = store.findByPartNumber('ps11752778');

    expect(rows.map((row) => row.part_name)).toEqual(['Refrigerator Water Inlet Valve']);
    expect(rows[0]?.part_price).toBe(39.5);
  });

  it('finds a part by manufacturer number or by a number it replaces', () => {
    expect(store.findByPartNumber('W10348269').map((row) => row.part_id)).toEqual(['PS3406971']);
    expect(store.findByPartNumber('AP6020238').map((row) => row.part_id)).toEqual(['PS11752778']);
  });

  it('returns nothing for an unknown or blank part number', () => {
    expect(store.findByPartNumber('PS0000000')).toEqual([]);
    expect(store.findByPartNumber('  ')).toEqual([]);
  });

  it('ranks keyword matches by the number of matching terms', () => {
    const rows = store.searchParts({ keywords: 'refrigerator ice maker leaking' });

    expect(rows.map((row) => row.part_id)).toEqual(['PS11752778', 'PS2000001', 'PS3406971']);
  });

  it('filters keyword matches by appliance type and brand', () => {
    expect(store.searchParts({ keywords: 'leaking', applianceType: 'dishwasher' }).map((row) => row.part_id)).toEqual(['PS3406971']);
    expect(store.searchParts({ keywords: 'leaking', applianceType: 'refrigerator', brand: 'ge' }).map((row) => row.part_id)).toEqual([
      'PS2000001'
    ]);
  });

  it('honours the row limit', () => {
    expect(store.searchParts({ keywords: 'leaking', limit: 1 })).toHaveLength(1);
  });

  it('returns nothing without usable terms or filters', () => {
    expect(store.searchParts({ keywords: 'the and for' })).toEqual([]);
    expect(store.searchParts({})).toEqual([]);
  });
});

describe('keywordTerms', () => {
  it('drops stop words and short terms, dedupes and caps at six', () => {
    expect(keywordTerms('What is the ice maker ice tray for my GE fridge door seal gasket')).toEqual([
      'ice',
      'maker',
      'tray',
      'fridge',
      'door',
      'seal'
    ]);
  });
});
