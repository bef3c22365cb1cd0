import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { StrategyDemoResult, StrategyScenario } from './strategy.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/strategy')
export class StrategyController {
  constructor(private readonly scenario: StrategyScenario) {}

  /**
   * Prices one order with every strategy, then shows which strategy a 3,000,000 order gets.
   *
   * GET /api/patterns/strategy/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<StrategyDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/strategy/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
