import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { TradeRecord, TradeSide } from '../trades/entities/trade-record.entity';
import { RealizedTrade } from './entities/realized-trade.entity';
import { OpenPosition } from './entities/open-position.entity';
import { MatchDiagnostic } from './entities/match-diagnostic.entity';
import { ZERO } from '../common/utils/decimal.util';

export interface MatchResult {
  realized: RealizedTrade[];      // in closing order
  openPosition: OpenPosition;
  diagnostics: MatchDiagnostic[];
}

// Mutable while a scope is being matched
interface PositionState {
  quantity: Decimal;
  averagePrice: Decimal;
}

const SIDE_ORDER: Record<TradeSide, number> = {
  [TradeSide.BUY]: 0,
  [TradeSide.SELL]: 1,
};

// Execution time, then buys before sells, then quantity, fill price and commission
// ascending. Fills at the same instant match the same way whatever their input order.
function compareExecution(a: TradeRecord, b: TradeRecord): number {
  return (
    a.executionTimestamp.getTime() - b.executionTimestamp.getTime() ||
    SIDE_ORDER[a.side] - SIDE_ORDER[b.side] ||
    a.quantity.comparedTo(b.quantity) ||
    a.fillPrice.comparedTo(b.fillPrice) ||
    a.commission.comparedTo(b.commission)
  );
}

function sortByExecution(trades: readonly TradeRecord[]): TradeRecord[] {
  return [...trades].sort(compareExecution);
}

// Average-price position matching for one symbol within one scope.
// Not per-lot FIFO: a position carries a single volume-weighted entry price.
@Injectable()
export class PositionMatcherService {
  /**
   * Matches a symbol's fills in time order into realized round-trips.
   * Never throws: anomalies come back as diagnostics.
   *
   * - fewer than 2 fills: no matching, one 'unmatched' diagnostic
   * - selling past a long: excess dropped, 'overselling' diagnostic
   * - position left open: 'unclosed' diagnostic
   */
  matchPositions(symbol: string, trades: readonly TradeRecord[]): MatchResult {
    const ordered = sortByExecution(trades);
    const diagnostics: MatchDiagnostic[] = [];
    const realized: RealizedTrade[] = [];

    if (ordered.length < 2) {
      const [single] = ordered;
      if (single) {
        diagnostics.push({
          kind: 'unmatched',
          symbol,
          side: single.side,
          quantity: single.quantity,
          fillPrice: single.fillPrice,
        });
      }
      return { realized, openPosition: { symbol, quantity: ZERO, averagePrice: ZERO }, diagnostics };
    }

    const position: PositionState = { quantity: ZERO, averagePrice: ZERO };

    for (const trade of ordered) {
      const closed =
        trade.side === TradeSide.BUY
          ? this.handleBuy(position, trade)
          : this.handleSell(position, trade, diagnostics);
      if (closed) {
        realized.push(closed);
      }
    }

    if (!position.quantity.isZero()) {
      diagnostics.push({
        kind: 'unclosed',
        symbol,
        direction: position.quantity.greaterThan(0) ? 'long' : 'short',
        quantity: position.quantity.abs(),
      });
    }

    return {
      realized,
      openPosition: { symbol, quantity: position.quantity, averagePrice: position.averagePrice },
      diagnostics,
    };
  }

  // Covers a short first; whatever is left opens or extends a long.
  private handleBuy(position: PositionState, trade: TradeRecord): RealizedTrade | undefined {
    if (position.quantity.lessThan(0)) {
      const qtyToClose = Decimal.min(trade.quantity, position.quantity.negated());
      const closed = this.realize(trade, qtyToClose, position.averagePrice);
      position.quantity = position.quantity.plus(qtyToClose);

      const qtyRemaining = trade.quantity.minus(qtyToClose);
      if (qtyRemaining.greaterThan(0)) {
        position.quantity = qtyRemaining;
        position.averagePrice = trade.fillPrice;
      } else if (position.quantity.isZero()) {
        position.averagePrice = ZERO;
      }
      return closed;
    }

    if (position.quantity.isZero()) {
      position.quantity = trade.quantity;
      position.averagePrice = trade.fillPrice;
      return undefined;
    }

    this.blend(position, trade);
    return undefined;
  }

  // Closes a long first; excess beyond the long is dropped, never shorted.
  private handleSell(
    position: PositionState,
    trade: TradeRecord,
    diagnostics: MatchDiagnostic[],
  ): RealizedTrade | undefined {
    if (position.quantity.greaterThan(0)) {
      const qtyToClose = Decimal.min(trade.quantity, position.quantity);
      const closed = this.realize(trade, qtyToClose, position.averagePrice);
      position.quantity = position.quantity.minus(qtyToClose);

      const qtyRemaining = trade.quantity.minus(qtyToClose);
      if (qtyRemaining.greaterThan(0)) {
        diagnostics.push({
          kind: 'overselling',
          symbol: trade.symbol,
          closedQuantity: qtyToClose,
          excessQuantity: qtyRemaining,
          executionTimestamp: trade.executionTimestamp,
        });
      }

      if (position.quantity.isZero()) {
        position.averagePrice = ZERO;
      }
      return closed;
    }

    if (position.quantity.isZero()) {
      position.quantity = trade.quantity.negated();
      position.averagePrice = trade.fillPrice;
      return undefined;
    }

    this.blend(position, trade);
    return undefined;
  }

  // Adds to a position on the same side at the volume-weighted price.
  private blend(position: PositionState, trade: TradeRecord): void {
    const size = position.quantity.abs();
    const totalValue = position.averagePrice.times(size).plus(trade.fillPrice.times(trade.quantity));
    const newSize = size.plus(trade.quantity);
    position.averagePrice = totalValue.dividedBy(newSize);
    position.quantity = trade.side === TradeSide.BUY ? newSize : newSize.negated();
  }

  // Buying back a short gains when the fill is below entry; selling a long when above.
  private realize(trade: TradeRecord, quantity: Decimal, entryPrice: Decimal): RealizedTrade {
    const priceDiff =
      trade.side === TradeSide.BUY
        ? entryPrice.minus(trade.fillPrice)
        : trade.fillPrice.minus(entryPrice);

    return {
      symbol: trade.symbol,
      quantity,
      entryPrice,
      exitPrice: trade.fillPrice,
      pnl: priceDiff.times(quantity),
      commission: trade.commission,
      closedAt: trade.executionTimestamp,
    };
  }
}
