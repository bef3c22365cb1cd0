import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { RepositoryScenario, RepositoryStep } from './repository.scenario';
import { PatternDemoResponse, PatternTestResponse } from '../../common/interfaces/pattern-response.interface';

@Controller('api/patterns/repository')
export class RepositoryController {
  constructor(private readonly scenario: RepositoryScenario) {}

  /** GET /api/patterns/repository/demo */
  @Get('demo')
  @HttpCode(HttpStatus.OK)
  demo(): Promise<PatternDemoResponse<RepositoryStep[]>> {
    return this.scenario.runDemo();
  }

  /** GET /api/patterns/repository/test */
  @Get('test')
  @HttpCode(HttpStatus.OK)
  test(): Promise<PatternTestResponse> {
    return this.scenario.runTest();
  }
}
