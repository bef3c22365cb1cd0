import { RandomSource, createSeededRandom } from '../../common/utils/random.util';

/** [symbol, bid, ask, epoch milliseconds] */
export type LegacyQuoteTuple = [string, number, number, number];

export const LEGACY_MARKET_DATA_PROVIDER = 'LEGACY_MARKET_DATA_PROVIDER';

// Old synchronous feed. Quotes a one-dollar spread around a base in [100, 150).
export class LegacyMarketDataProvider {
  constructor(private readonly random: RandomSource = createSeededRandom(50)) {}

  getQuoteLegacy(symbol: string): LegacyQuoteTuple {
    const basePrice = 100 + this.random() * 50;
    return [symbol, basePrice - 0.5, basePrice + 0.5, Date.now()];
  }
}
