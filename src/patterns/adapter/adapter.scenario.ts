import { Injectable } from '@nestjs/common';
import { MarketDataAdapter } from './market-data.adapter';
import { Quote } from '../../domain/entities/quote.entity';
import { toDecimal, toNumber } from '../../common/utils/decimal.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Adapter';
const DEMO_SYMBOLS = ['AAPL', 'MSFT', 'GOOGL'];

export interface AdaptedQuote {
  symbol: string;
  quote: Quote;
  spread: number;
}

function spreadOf(quote: Quote): number {
  return toNumber(toDecimal(quote.ask).minus(quote.bid));
}

@Injectable()
export class AdapterScenario implements PatternScenario {
  constructor(private readonly marketData: MarketDataAdapter) {}

  async runDemo(): Promise<PatternDemoResponse<AdaptedQuote[]>> {
    const result: AdaptedQuote[] = [];
    for (const symbol of DEMO_SYMBOLS) {
      const quote = await this.marketData.getQuote(symbol);
      result.push({ symbol, quote, spread: spreadOf(quote) });
    }

    return {
      pattern: PATTERN,
      description:
        'Demonstrates adapter pattern: legacy market data provider adapted to modern async interface.',
      result,
      metadata: {
        legacyToModern: true,
        asyncAdaptation: true,
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const quote = await this.marketData.getQuote('TEST');
    const ageSeconds = (Date.now() - quote.timestamp.getTime()) / 1000;

    return toTestResponse(PATTERN, [
      check('Adapter Returns Quote', quote.symbol === 'TEST', `Retrieved quote for ${quote.symbol}`),
      check(
        'Quote Values Valid',
        quote.bid > 0 && quote.ask > quote.bid,
        `Bid=${quote.bid}, Ask=${quote.ask}, Spread=${spreadOf(quote)}`,
      ),
      check('Quote Timestamp Recent', ageSeconds < 5, `Timestamp is ${ageSeconds.toFixed(2)} seconds ago`),
    ]);
  }
}
