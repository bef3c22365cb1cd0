import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { CommandDemoResult, CommandScenario } from './command.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/command')
export class CommandController {
  constructor(private readonly scenario: CommandScenario) {}

  /**
   * Executes one PlaceOrderCommand, queues another, returns the first audit entries.
   *
   * GET /api/patterns/command/demo
   */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<CommandDemoResult>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/command/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
