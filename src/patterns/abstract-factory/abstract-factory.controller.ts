import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { AbstractFactoryDemoResult, AbstractFactoryScenario } from './abstract-factory.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/abstract-factory')
export class AbstractFactoryController {
  constructor(private readonly scenario: AbstractFactoryScenario) {}

  /**
   * Builds the Stripe and PayPal families and runs one Stripe payment.
   *
   * GET /api/patterns/abstract-factory/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<AbstractFactoryDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/abstract-factory/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
