import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { FacadeScenario, FacadeStep } from './facade.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/facade')
export class FacadeController {
  constructor(private readonly scenario: FacadeScenario) {}

  /**
   * Places an order through the trading facade, then cancels it.
   *
   * GET /api/patterns/facade/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<FacadeStep[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/facade/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
