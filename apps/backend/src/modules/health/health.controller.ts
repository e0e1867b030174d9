import { Controller, Get } from '@nestjs/common';

@Controller()
export class HealthController {
  @Get()
  info(): { message: string } {
    return { message: 'Generate documentation' };
  }

  @Get('health')
  check(): { status: string; timestamp: string } {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }
}
