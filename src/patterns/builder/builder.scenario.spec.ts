import { Test, TestingModule } from '@nestjs/testing';
import { BuilderScenario } from './builder.scenario';
import { OrderBuilder } from './order.builder';
import { OrderSide } from '../../domain/entities/order.entity';

describe('BuilderScenario', () => {
  let scenario: BuilderScenario;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [OrderBuilder, BuilderScenario],
    }).compile();

    scenario = module.get<BuilderScenario>(BuilderScenario);
  });

  it('should build a simple and a limit order', async () => {
    const { result } = await scenario.runDemo();

    expect(result.map(r => r.type)).toEqual(['Simple Order', 'Complex Order']);
    expect(result[0].order.limitPrice).toBeUndefined();
    expect(result[1].order).toMatchObject({ side: OrderSide.SELL, quantity: 500, limitPrice: 305 });
  });

  it('should pass all checks', async () => {
    const test = await scenario.runTest();

    expect(test.status).toBe('PASS');
    expect(test.checks[2].details).toBe('Builder rejected incomplete order: Symbol is required');
  });
});
