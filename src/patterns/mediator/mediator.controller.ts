import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { MediatorScenario, MediatorStep } from './mediator.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/mediator')
export class MediatorController {
  constructor(private readonly scenario: MediatorScenario) {}

  /**
   * Creates an order and reads it back, both through the mediator.
   *
   * GET /api/patterns/mediator/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<MediatorStep[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/mediator/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
