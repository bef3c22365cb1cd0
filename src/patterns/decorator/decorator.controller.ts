import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { DecoratorDemoResult, DecoratorScenario } from './decorator.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/decorator')
export class DecoratorController {
  constructor(private readonly scenario: DecoratorScenario) {}

  /**
   * Runs a payment through the decorated processor and returns the metrics it recorded.
   *
   * GET /api/patterns/decorator/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<DecoratorDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/decorator/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
