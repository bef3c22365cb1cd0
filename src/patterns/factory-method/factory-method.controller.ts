import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { FactoryMethodScenario, ValidatorSelection } from './factory-method.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/factory-method')
export class FactoryMethodController {
  constructor(private readonly scenario: FactoryMethodScenario) {}

  /**
   * Validates a standard and a large order through factory-chosen validators.
   *
   * GET /api/patterns/factory-method/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<ValidatorSelection[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/factory-method/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
