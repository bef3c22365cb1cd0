import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { AdaptedQuote, AdapterScenario } from './adapter.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/adapter')
export class AdapterController {
  constructor(private readonly scenario: AdapterScenario) {}

  /**
   * Quotes AAPL, MSFT and GOOGL through the adapted legacy feed.
   *
   * GET /api/patterns/adapter/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<AdaptedQuote[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/adapter/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
