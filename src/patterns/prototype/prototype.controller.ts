import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { PrototypeScenario, PrototypeStep } from './prototype.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/prototype')
export class PrototypeController {
  constructor(private readonly scenario: PrototypeScenario) {}

  /** GET /api/patterns/prototype/demo */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<PrototypeStep[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/prototype/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
