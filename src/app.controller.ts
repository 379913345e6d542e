import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AppService } from './app.service';

@ApiTags('service')
@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getInfo() {
    return this.appService.getInfo();
  }

  @Get('api/health')
  getHealth() {
    return this.appService.getHealth();
  }

  @Get('api/features')
  getFeatures() {
    return this.appService.getFeatures();
  }
}
