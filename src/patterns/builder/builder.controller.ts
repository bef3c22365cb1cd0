import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { BuiltOrder, BuilderScenario } from './builder.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/builder')
export class BuilderController {
  constructor(private readonly scenario: BuilderScenario) {}

  /**
   * Builds a simple market order and a limit order.
   *
   * GET /api/patterns/builder/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<BuiltOrder[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/builder/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
