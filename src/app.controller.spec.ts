import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';

describe('AppController', () => {
  let controller: AppController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should report health', () => {
    const health = controller.getHealth();

    expect(health.status).toBe('ok');
    expect(health.service).toBe('fintech-patterns-api');
    expect(health.uptime).toBeGreaterThanOrEqual(0);
    expect(Number.isNaN(Date.parse(health.timestamp))).toBe(false);
  });

  it('should list demo and test endpoints for all sixteen patterns', () => {
    const root = controller.getRoot();

    expect(Object.keys(root.patterns)).toHaveLength(16);
    expect(root.patterns['chain-of-responsibility']).toEqual({
      demo: '/api/patterns/chain-of-responsibility/demo',
      test: '/api/patterns/chain-of-responsibility/test',
    });
    expect(root.health).toBe('/health');
  });
});
