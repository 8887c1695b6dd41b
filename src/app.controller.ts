import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';

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
      service: 'sandbox-equity-service',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Sandbox Trading & Equity History API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        sandboxes: '/sandboxes',
        sharedSandboxes: '/sandboxes/shared',
        portfolio: '/sandboxes/:sandboxId/portfolio',
        transactions: '/sandboxes/:sandboxId/transactions',
        trade: '/sandboxes/:sandboxId/trade',
        shares: '/sandboxes/:sandboxId/shares',
        quote: '/market/quote/:symbol',
        search: '/market/search?q=',
      },
    };
  }
}
