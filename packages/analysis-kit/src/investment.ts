/**
 * Buy-and-hold simulation
 */

import { NOTIONAL_INVESTMENT } from '@ashare/contracts';
import type { Bar, InvestmentSimulation } from '@ashare/contracts';

/**
 * Buys at the first close with `principal` and values the position at the last close.
 *
 * With fewer than two bars, or a first close of 0, nothing is bought:
 * shares 0, final value equal to the principal, profit 0.
 *
 * @example
 * ```typescript
 * simulateInvestment(bars); // closes 10.00 → 9.80: shares 1000, finalValue 9800, profit -200
 * ```
 */
export function simulateInvestment(
  bars: readonly Bar[],
  principal: number = NOTIONAL_INVESTMENT
): InvestmentSimulation {
  const first = bars[0];
  const last = bars[bars.length - 1];

  if (bars.length < 2 || !first || !last || first.close === 0) {
    return {
      executed: false,
      principal,
      shares: 0,
      finalValue: principal,
      profit: 0,
      profitPercent: 0,
    };
  }

  const shares = principal / first.close;
  const finalValue = shares * last.close;
  const profit = finalValue - principal;

  return {
    executed: true,
    principal,
    shares,
    finalValue,
    profit,
    profitPercent: (profit / principal) * 100,
  };
}
