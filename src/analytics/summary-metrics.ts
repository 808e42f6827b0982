import Decimal from 'decimal.js';
import { ZERO } from '../common/utils/decimal.util';

/** wins / total x 100, 0 when total is 0 */
export function winRate(wins: number, total: number): number {
  return total > 0 ? (wins / total) * 100 : 0;
}

type ProfitFactorInput = {
  avgWin: Decimal;
  avgLoss: Decimal;
  winningTrades: number;
  losingTrades: number;
};

/**
 * Gross wins over gross losses for a daily or weekly summary.
 * null when nothing was lost.
 */
export function profitFactor(summary: ProfitFactorInput): Decimal | null {
  if (summary.losingTrades === 0 || summary.avgLoss.isZero()) {
    return null;
  }
  const totalWins = summary.avgWin.times(summary.winningTrades);
  const totalLosses = summary.avgLoss.abs().times(summary.losingTrades);
  return totalWins.dividedBy(totalLosses);
}

/**
 * First item holding the largest ('max') or smallest ('min') value.
 * Ties go to the earlier item, so callers order the input to fix the tiebreak.
 */
export function pickExtreme<T>(
  items: readonly T[],
  valueOf: (item: T) => Decimal,
  direction: 'max' | 'min',
): T | null {
  let best: T | null = null;
  let bestValue = ZERO;
  for (const item of items) {
    const value = valueOf(item);
    if (best === null || (direction === 'max' ? value.greaterThan(bestValue) : value.lessThan(bestValue))) {
      best = item;
      bestValue = value;
    }
  }
  return best;
}
