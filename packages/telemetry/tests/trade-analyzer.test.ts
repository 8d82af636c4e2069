import { describe, it, expect } from '@jest/globals';
import { TradeEvent, TradeSide } from '@tradewire/types';
import { TradeAnalyzer } from '../src';

function trade(side: TradeSide, quantity: number): TradeEvent {
  return { kind: 'trade', side, quantity, timestamp: 1 };
}

describe('TradeAnalyzer', () => {
  it('should report zeros without trades', () => {
    expect(new TradeAnalyzer().analyze()).toEqual({
      quantity: { mean: 0, std: 0, max: 0 },
      sides: { buyCount: 0, sellCount: 0, buyVolume: 0 },
      windowSize: 0
    });
  });

  it('should describe quantities and sides', () => {
    const analyzer = new TradeAnalyzer();
    analyzer.add(trade(TradeSide.BUY, 2));
    analyzer.add(trade(TradeSide.SELL, 4));
    analyzer.add(trade(TradeSide.BUY, 4));
    analyzer.add(trade(TradeSide.BUY, 6));

    expect(analyzer.analyze()).toEqual({
      quantity: { mean: 4, std: Math.sqrt(2), max: 6 },
      sides: { buyCount: 3, sellCount: 1, buyVolume: 12 },
      windowSize: 4
    });
  });

  it('should only keep the most recent trades', () => {
    const analyzer = new TradeAnalyzer(2);
    analyzer.add(trade(TradeSide.BUY, 100));
    analyzer.add(trade(TradeSide.SELL, 1));
    analyzer.add(trade(TradeSide.SELL, 3));

    const analysis = analyzer.analyze();
    expect(analyzer.size).toBe(2);
    expect(analysis.quantity.max).toBe(3);
    expect(analysis.sides.buyCount).toBe(0);
  });
});
