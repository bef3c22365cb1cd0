import { StateScenario } from './state.scenario';
import { OrderStatus } from '../../domain/entities/order.entity';

describe('StateScenario', () => {
  const scenario = new StateScenario();

  it('should walk Pending -> Placed -> Filled and refuse the final cancel', async () => {
    const { result } = await scenario.runDemo();

    expect(result.map(step => step.step)).toEqual(['Initial', 'Place', 'Fill', 'Invalid Cancel']);
    expect(result.slice(0, 3).map(step => ('state' in step ? step.state : undefined))).toEqual([
      OrderStatus.PENDING,
      OrderStatus.PLACED,
      OrderStatus.FILLED,
    ]);
    expect(result[3]).toEqual({
      step: 'Invalid Cancel',
      success: true,
      message: 'Cannot cancel order in Filled state (terminal).',
    });
  });

  it('should pass all checks', async () => {
    const response = await scenario.runTest();

    expect(response.checks).toHaveLength(4);
    expect(response.status).toBe('PASS');
  });
});
