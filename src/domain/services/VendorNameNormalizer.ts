import type { RawTransaction } from '../entities/RawTransaction.js';
import type { VendorNormalizationEntry, VendorOverride } from '../entities/VendorNormalizationEntry.js';

// Order matters: ' PVT.' must go before ' PVT', ' LTD.' before ' LTD'.
const legalSuffixes = [' PVT.', ' PVT', ' LTD.', ' LTD', ' INC'] as const;

export const NORMALIZATION_RULE = 'UPPER + TRIM + REMOVE LEGAL SUFFIXES';
export const OVERRIDE_RULE = 'MANUAL OVERRIDE';

/**
 * Literal substring removal, not anchored: a suffix token inside a longer word
 * ("ACME LTDA", "BIG INCOME") is removed as well.
 */
export const normalizeVendorName = (input: string): string => {
  const upper = input.toUpperCase();
  return legalSuffixes.reduce((cleaned, suffix) => cleaned.replaceAll(suffix, ''), upper).trim();
};

/**
 * One entry per distinct raw vendor string, case-sensitive. Overrides keyed by the
 * same raw string win; overrides for names not present in `rows` are ignored.
 */
export const buildNormalizationMap = (
  rows: readonly RawTransaction[],
  overrides: readonly VendorOverride[],
  createdAt: string,
): Map<string, VendorNormalizationEntry> => {
  const overridesByRaw = new Map(overrides.map((override) => [override.rawVendorName, override]));
  const map = new Map<string, VendorNormalizationEntry>();

  for (const row of rows) {
    const raw = row.vendorName;

    if (raw === null || map.has(raw)) {
      continue;
    }

    const override = overridesByRaw.get(raw);

    map.set(raw, {
      rawVendorName: raw,
      cleanVendorName: override ? override.cleanVendorName : normalizeVendorName(raw),
      ruleApplied: override ? OVERRIDE_RULE : NORMALIZATION_RULE,
      createdAt,
    });
  }

  return map;
};
