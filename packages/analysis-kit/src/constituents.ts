/**
 * Index constituent breakdown
 */

import type { ConstituentBreakdown, IndexConstituent } from '@ashare/contracts';

/**
 * Counts constituents per exchange from their `sh.`/`sz.` code prefix
 *
 * @example
 * ```typescript
 * summarizeConstituents([{ code: 'sh.600000', ... }, { code: 'sz.000001', ... }]);
 * // { total: 2, byExchange: { sh: 1, sz: 1, other: 0 } }
 * ```
 */
export function summarizeConstituents(
  constituents: readonly IndexConstituent[]
): ConstituentBreakdown {
  const byExchange = { sh: 0, sz: 0, other: 0 };

  for (const { code } of constituents) {
    if (code.startsWith('sh.')) {
      byExchange.sh++;
    } else if (code.startsWith('sz.')) {
      byExchange.sz++;
    } else {
      byExchange.other++;
    }
  }

  return { total: constituents.length, byExchange };
}
