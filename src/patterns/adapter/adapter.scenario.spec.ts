import { Test, TestingModule } from '@nestjs/testing';
import { AdapterScenario } from './adapter.scenario';
import { MarketDataAdapter } from './market-data.adapter';
import { LEGACY_MARKET_DATA_PROVIDER, LegacyMarketDataProvider } from './legacy-market-data.provider';
import { fixedRandom } from '../../common/utils/random.util';

describe('AdapterScenario', () => {
  let scenario: AdapterScenario;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: LEGACY_MARKET_DATA_PROVIDER, useValue: new LegacyMarketDataProvider(fixedRandom(0.2)) },
        MarketDataAdapter,
        AdapterScenario,
      ],
    }).compile();

    scenario = module.get<AdapterScenario>(AdapterScenario);
  });

  it('should quote three symbols with a one dollar spread', async () => {
    const { result } = await scenario.runDemo();

    expect(result.map(r => r.symbol)).toEqual(['AAPL', 'MSFT', 'GOOGL']);
    expect(result.map(r => r.spread)).toEqual([1, 1, 1]);
    expect(result[0].quote.last).toBe(110);
  });

  it('should pass all checks', async () => {
    expect((await scenario.runTest()).status).toBe('PASS');
  });
});
