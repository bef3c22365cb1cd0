import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { SingletonDemoResult, SingletonScenario } from './singleton.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/singleton')
export class SingletonController {
  constructor(private readonly scenario: SingletonScenario) {}

  /**
   * Reads configuration five times through the shared instance.
   *
   * GET /api/patterns/singleton/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<SingletonDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/singleton/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
