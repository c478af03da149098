import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';
import { HealthCheckDto } from './common/dto/health-check.dto';

@Controller('health')
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getHealth(): { status: string; timestamp: string } {
    return this.appService.getHealth();
  }

  /** Memory, turn store, session cache and persistence queue */
  @Get('detailed')
  getDetailedHealth(): Promise<HealthCheckDto> {
    return this.appService.getDetailedHealth();
  }
}
