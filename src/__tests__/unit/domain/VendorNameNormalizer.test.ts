import { describe, it, expect } from 'vitest';
import {
  NORMALIZATION_RULE,
  OVERRIDE_RULE,
  buildNormalizationMap,
  normalizeVendorName,
} from '../../../domain/services/VendorNameNormalizer.js';
import { LOAD_TIME, rawRow } from '../../utils/fixtures.js';

describe('normalizeVendorName', () => {
  it('folds differently punctuated legal forms to the same name', () => {
    expect(normalizeVendorName('ABC Pvt. Ltd.')).toBe('ABC');
    expect(normalizeVendorName('abc pvt ltd')).toBe('ABC');
    expect(normalizeVendorName('ABC Pvt. Ltd.')).toBe(normalizeVendorName('abc pvt ltd'));
  });

  it('removes INC and trims surrounding whitespace', () => {
    expect(normalizeVendorName('  Globex Inc  ')).toBe('GLOBEX');
  });

  it('removes suffix tokens in the middle of a name', () => {
    expect(normalizeVendorName('Tata Ltd. Steel')).toBe('TATA STEEL');
  });

  it('removes tokens that prefix a longer word', () => {
    expect(normalizeVendorName('Big Income Traders')).toBe('BIGOME TRADERS');
    expect(normalizeVendorName('Rio Ltda')).toBe('RIOA');
  });

  it('leaves tokens that are not preceded by a space', () => {
    expect(normalizeVendorName('Pvt Solutions')).toBe('PVT SOLUTIONS');
  });

  it('maps an empty name to an empty string', () => {
    expect(normalizeVendorName('')).toBe('');
    expect(normalizeVendorName('   ')).toBe('');
  });
});

describe('buildNormalizationMap', () => {
  it('creates one entry per distinct raw vendor string, case-sensitively', () => {
    const rows = [
      rawRow({ purchaseId: 'A', vendorName: 'Acme Pvt. Ltd.' }),
      rawRow({ purchaseId: 'B', vendorName: 'Acme Pvt. Ltd.' }),
      rawRow({ purchaseId: 'C', vendorName: 'ACME PVT LTD' }),
      rawRow({ purchaseId: 'D', vendorName: null }),
    ];

    const map = buildNormalizationMap(rows, [], LOAD_TIME);

    expect(Array.from(map.keys())).toEqual(['Acme Pvt. Ltd.', 'ACME PVT LTD']);
    expect(map.get('Acme Pvt. Ltd.')).toEqual({
      rawVendorName: 'Acme Pvt. Ltd.',
      cleanVendorName: 'ACME',
      ruleApplied: NORMALIZATION_RULE,
      createdAt: LOAD_TIME,
    });
    expect(map.get('ACME PVT LTD')?.cleanVendorName).toBe('ACME');
  });

  it('prefers a stored override for the same raw name', () => {
    const rows = [rawRow({ vendorName: 'Initech Inc' }), rawRow({ purchaseId: 'B', vendorName: 'Globex Ltd' })];
    const overrides = [
      { rawVendorName: 'Initech Inc', cleanVendorName: 'INITECH CORPORATION', updatedAt: LOAD_TIME },
      { rawVendorName: 'Vanished Ltd', cleanVendorName: 'VANISHED', updatedAt: LOAD_TIME },
    ];

    const map = buildNormalizationMap(rows, overrides, LOAD_TIME);

    expect(map.size).toBe(2);
    expect(map.get('Initech Inc')).toMatchObject({ cleanVendorName: 'INITECH CORPORATION', ruleApplied: OVERRIDE_RULE });
    expect(map.get('Globex Ltd')).toMatchObject({ cleanVendorName: 'GLOBEX', ruleApplied: NORMALIZATION_RULE });
    expect(map.has('Vanished Ltd')).toBe(false);
  });

  it('returns an empty map for no rows', () => {
    expect(buildNormalizationMap([], [], LOAD_TIME).size).toBe(0);
  });
});
