import { Inject, Injectable, Logger } from '@nestjs/common';
import { LEGACY_MARKET_DATA_PROVIDER, LegacyMarketDataProvider } from './legacy-market-data.provider';
import { Quote } from '../../domain/entities/quote.entity';
import { midpoint, toNumber } from '../../common/utils/decimal.util';

export interface MarketDataProvider {
  getQuote(symbol: string, signal?: AbortSignal): Promise<Quote>;
}

// Presents the legacy tuple feed through the async Quote interface.
@Injectable()
export class MarketDataAdapter implements MarketDataProvider {
  private readonly logger = new Logger(MarketDataAdapter.name);

  constructor(
    @Inject(LEGACY_MARKET_DATA_PROVIDER) private readonly legacyProvider: LegacyMarketDataProvider,
  ) {}

  async getQuote(symbol: string, signal?: AbortSignal): Promise<Quote> {
    signal?.throwIfAborted();

    const [quotedSymbol, bid, ask, epochMs] = this.legacyProvider.getQuoteLegacy(symbol);
    this.logger.debug(`Adapted legacy quote for ${quotedSymbol}`);

    return {
      symbol: quotedSymbol,
      bid,
      ask,
      last: toNumber(midpoint(bid, ask)),
      timestamp: new Date(epochMs),
    };
  }
}
