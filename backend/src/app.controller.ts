// cutshift/backend/src/app.controller.ts
import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from './config/environment';

@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService<Environment, true>) {}

  /**
   * Service description
   * GET /api (due to global prefix)
   */
  @Get()
  getInfo(): { name: string; version: string; status: string; endpoints: Record<string, string> } {
    const service = this.configService.get('service', { infer: true });
    return {
      name: service.title,
      version: service.version,
      status: 'running',
      endpoints: {
        process: 'POST /api/process',
        health: 'GET /api/health',
      },
    };
  }

  /**
   * Health check
   * GET /api/health
   */
  @Get('health')
  getHealth(): { status: string; timestamp: string; service: string } {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: this.configService.get('service', { infer: true }).name,
    };
  }
}
