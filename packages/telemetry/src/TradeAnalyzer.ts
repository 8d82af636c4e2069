import * as ss from 'simple-statistics';
import { TradeEvent, TradeSide } from '@tradewire/types';

export interface TradeAnalysis {
  quantity: {
    mean: number;
    /** Population standard deviation */
    std: number;
    max: number;
  };
  sides: {
    buyCount: number;
    sellCount: number;
    buyVolume: number;
  };
  /** Number of trades the figures are computed over */
  windowSize: number;
}

/**
 * Descriptive statistics over a sliding window of recent trades
 */
export class TradeAnalyzer {
  private trades: TradeEvent[] = [];

  constructor(private readonly maxTrades: number = 100) {}

  add(trade: TradeEvent): void {
    this.trades.push(trade);
    if (this.trades.length > this.maxTrades) {
      this.trades.splice(0, this.trades.length - this.maxTrades);
    }
  }

  analyze(): TradeAnalysis {
    if (this.trades.length === 0) {
      return {
        quantity: { mean: 0, std: 0, max: 0 },
        sides: { buyCount: 0, sellCount: 0, buyVolume: 0 },
        windowSize: 0
      };
    }

    const quantities = this.trades.map((trade) => trade.quantity);
    const buys = this.trades.filter((trade) => trade.side === TradeSide.BUY);

    return {
      quantity: {
        mean: ss.mean(quantities),
        std: ss.standardDeviation(quantities),
        max: ss.max(quantities)
      },
      sides: {
        buyCount: buys.length,
        sellCount: this.trades.length - buys.length,
        buyVolume: ss.sum(buys.map((trade) => trade.quantity))
      },
      windowSize: this.trades.length
    };
  }

  get size(): number {
    return this.trades.length;
  }
}
