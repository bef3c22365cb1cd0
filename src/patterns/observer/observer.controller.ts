import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ObserverDemoResult, ObserverScenario } from './observer.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/observer')
export class ObserverController {
  constructor(private readonly scenario: ObserverScenario) {}

  /**
   * Publishes an OrderPlaced and an OrderFilled event and reports which handlers saw them.
   *
   * GET /api/patterns/observer/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<ObserverDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/observer/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
