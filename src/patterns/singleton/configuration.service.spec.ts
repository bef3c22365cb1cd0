import { Test, TestingModule } from '@nestjs/testing';
import { ConfigurationService } from './configuration.service';

describe('ConfigurationService', () => {
  let module: TestingModule;
  let service: ConfigurationService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      providers: [ConfigurationService],
    }).compile();

    service = module.get<ConfigurationService>(ConfigurationService);
  });

  it('should resolve the same instance on every lookup', () => {
    const again = module.get<ConfigurationService>(ConfigurationService);

    expect(again).toBe(service);
    expect(again.instanceId).toBe(service.instanceId);
  });

  it('should format the instance id with a sequence number and hex suffix', () => {
    expect(service.instanceId).toMatch(/^ConfigService-\d+-[0-9a-f]{32}$/);
  });

  it('should give a separately constructed instance a different id', () => {
    expect(new ConfigurationService().instanceId).not.toBe(service.instanceId);
  });

  it('should return the trading settings', () => {
    expect(service.getValue('TradingApiUrl')).toBe('https://api.trading.example.com');
    expect(service.getValue('MaxOrderSize')).toBe('1000000');
    expect(service.getValue('DefaultCurrency')).toBe('USD');
  });

  it('should return an empty string for unknown keys', () => {
    expect(service.getValue('NoSuchKey')).toBe('');
  });

  it('should count every read, including misses', () => {
    service.getValue('TradingApiUrl');
    service.getValue('NoSuchKey');

    expect(service.accessCount).toBe(2);
  });
});
