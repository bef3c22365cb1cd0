import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ChainCase, ChainOfResponsibilityScenario } from './chain-of-responsibility.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/chain-of-responsibility')
export class ChainOfResponsibilityController {
  constructor(private readonly scenario: ChainOfResponsibilityScenario) {}

  /**
   * Sends a valid, an invalid and an oversized order through the validation chain.
   *
   * GET /api/patterns/chain-of-responsibility/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<ChainCase[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/chain-of-responsibility/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
