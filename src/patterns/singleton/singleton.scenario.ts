import { Injectable } from '@nestjs/common';
import { ConfigurationService } from './configuration.service';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Singleton';

export interface SingletonDemoCall {
  call: number;
  instanceId: string;
  configValue: string;
  accessCount: number;
}

export interface SingletonDemoResult {
  instanceId: string;
  calls: SingletonDemoCall[];
  note: string;
}

@Injectable()
export class SingletonScenario implements PatternScenario {
  constructor(private readonly configService: ConfigurationService) {}

  async runDemo(): Promise<PatternDemoResponse<SingletonDemoResult>> {
    const calls = [1, 2, 3, 4, 5].map((call): SingletonDemoCall => {
      const configValue = this.configService.getValue('TradingApiUrl');
      return {
        call,
        instanceId: this.configService.instanceId,
        configValue,
        accessCount: this.configService.accessCount,
      };
    });

    return {
      pattern: PATTERN,
      description:
        'Demonstrates singleton pattern: same instance ID across multiple calls, shared state (access count).',
      result: {
        instanceId: this.configService.instanceId,
        calls,
        note:
          'Each running process holds its own instance. Coordinate across instances with ' +
          'database constraints, optimistic concurrency or distributed locks.',
      },
      metadata: {
        lifetime: 'application',
        scalabilityNote: 'Singleton per instance only; not suitable for distributed coordination',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const firstId = this.configService.instanceId;
    const secondId = this.configService.instanceId;

    const before = this.configService.accessCount;
    this.configService.getValue('TestKey');
    const after = this.configService.accessCount;

    const apiUrl = this.configService.getValue('TradingApiUrl');

    return toTestResponse(PATTERN, [
      check('Instance ID Consistency', firstId === secondId, `Instance IDs match: ${firstId}`),
      check('Access Count Increment', after > before, `Access count increased from ${before} to ${after}`),
      check('Configuration Access', apiUrl !== '', `Retrieved config value: ${apiUrl}`),
    ]);
  }
}
