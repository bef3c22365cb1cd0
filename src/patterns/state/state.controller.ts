import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { StateScenario, StateStep } from './state.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/state')
export class StateController {
  constructor(private readonly scenario: StateScenario) {}

  /**
   * Walks an order from Pending to Filled and shows a refused cancel.
   *
   * GET /api/patterns/state/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<StateStep[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/state/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
