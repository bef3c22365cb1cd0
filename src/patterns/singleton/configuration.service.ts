import { Injectable } from '@nestjs/common';
import { compactUuid } from '../../common/utils/id.util';

// Process-wide, so a second construction is visible in the instance id.
let instanceSequence = 0;

const DEFAULT_SETTINGS: Readonly<Record<string, string>> = {
  TradingApiUrl: 'https://api.trading.example.com',
  RiskCheckEnabled: 'true',
  MaxOrderSize: '1000000',
  DefaultCurrency: 'USD',
  KafkaBootstrapServers: 'localhost:9092',
};

/**
 * Trading settings shared by the whole application.
 * Nest providers are singletons by default: one instance per app, handed out by DI.
 */
@Injectable()
export class ConfigurationService {
  readonly instanceId: string;
  private readonly settings = new Map<string, string>(Object.entries(DEFAULT_SETTINGS));
  private reads = 0;

  constructor() {
    instanceSequence += 1;
    this.instanceId = `ConfigService-${instanceSequence}-${compactUuid()}`;
  }

  /** Unknown keys read as an empty string. Every call counts as an access. */
  getValue(key: string): string {
    this.reads += 1;
    return this.settings.get(key) ?? '';
  }

  get accessCount(): number {
    return this.reads;
  }
}
