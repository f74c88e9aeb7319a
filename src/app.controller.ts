import { Controller, Get } from '@nestjs/common';

@Controller()
export class AppController {
  @Get()
  describe(): { service: string; endpoints: string[] } {
    return {
      service: 'eSIM Sync API',
      endpoints: ['POST /api/esim/check', 'POST /api/esim/renewal/create', 'GET /api/health'],
    };
  }
}
