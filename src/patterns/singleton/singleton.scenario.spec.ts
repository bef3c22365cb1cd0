import { Test, TestingModule } from '@nestjs/testing';
import { SingletonScenario } from './singleton.scenario';
import { ConfigurationService } from './configuration.service';

describe('SingletonScenario', () => {
  let scenario: SingletonScenario;
  let configService: ConfigurationService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ConfigurationService, SingletonScenario],
    }).compile();

    scenario = module.get<SingletonScenario>(SingletonScenario);
    configService = module.get<ConfigurationService>(ConfigurationService);
  });

  it('should report the same instance id on all five demo calls', async () => {
    const demo = await scenario.runDemo();
    const result = demo.result;

    expect(demo.pattern).toBe('Singleton');
    expect(result.calls).toHaveLength(5);
    expect(result.calls.every(c => c.instanceId === configService.instanceId)).toBe(true);
    expect(result.calls.map(c => c.accessCount)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should pass all checks', async () => {
    const test = await scenario.runTest();

    expect(test.status).toBe('PASS');
    expect(test.checks.map(c => c.name)).toEqual([
      'Instance ID Consistency',
      'Access Count Increment',
      'Configuration Access',
    ]);
  });
});
