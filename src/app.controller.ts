import { Controller, Get } from '@nestjs/common';
import { HealthResponse, PatternEndpoints, ServiceInfoResponse } from './common/interfaces/app-info.interface';
import { PATTERN_ROUTES } from './patterns/pattern-routes';

const SERVICE_NAME = 'fintech-patterns-api';
const SERVICE_VERSION = '1.0.0';

@Controller()
export class AppController {
  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: SERVICE_NAME,
    };
  }

  /**
   * API root - returns service info and the demo/test endpoint of every pattern.
   *
   * GET /
   */
  @Get()
  getRoot(): ServiceInfoResponse {
    const patterns: Record<string, PatternEndpoints> = {};
    for (const route of PATTERN_ROUTES) {
      patterns[route] = {
        demo: `/api/patterns/${route}/demo`,
        test: `/api/patterns/${route}/test`,
      };
    }

    return {
      message: 'FinTech Design Patterns API',
      version: SERVICE_VERSION,
      health: '/health',
      patterns,
    };
  }
}
