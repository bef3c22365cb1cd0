import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { StrategyAdvancedDemoResult, StrategyAdvancedScenario } from './strategy-advanced.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/strategy-advanced')
export class StrategyAdvancedPatternController {
  constructor(private readonly scenario: StrategyAdvancedScenario) {}

  /**
   * Pays through each provider and shows the validation and not-found failures.
   *
   * GET /api/patterns/strategy-advanced/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<StrategyAdvancedDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/strategy-advanced/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
