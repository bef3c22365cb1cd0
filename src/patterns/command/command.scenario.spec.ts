import { Test, TestingModule } from '@nestjs/testing';
import { CommandScenario } from './command.scenario';
import { CommandHandler } from './command.handler';
import { InMemoryOrderStore } from './order.store';
import { MetricsService } from '../../infrastructure/metrics/metrics.service';

describe('CommandScenario', () => {
  let scenario: CommandScenario;
  let store: InMemoryOrderStore;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricsService, CommandHandler, InMemoryOrderStore, CommandScenario],
    }).compile();

    scenario = module.get<CommandScenario>(CommandScenario);
    store = module.get<InMemoryOrderStore>(InMemoryOrderStore);
  });

  it('should execute, queue and show the audit trail', async () => {
    const { result } = await scenario.runDemo();

    expect(result.executed.result.success).toBe(true);
    expect(result.queued.queueCount).toBe(1);
    expect(result.auditLog.map(e => e.action)).toEqual(['EXECUTE', 'SUCCESS', 'QUEUED']);
    expect(await store.get('ORD-CMD-001')).toBeDefined();
    expect(await store.get('ORD-CMD-002')).toBeUndefined();
  });

  it('should pass all checks', async () => {
    const test = await scenario.runTest();

    expect(test.status).toBe('PASS');
    expect(test.checks.map(c => c.name)).toEqual([
      'Command Execution',
      'Order Persisted',
      'Command Undo',
      'Command Queue',
    ]);
  });
});
