import { Module } from '@nestjs/common';
import { OptimizerController } from './optimizer.controller';
import { OptimizerService } from './optimizer.service';
import { randomIntProvider } from './random.provider';

@Module({
  controllers: [OptimizerController],
  providers: [OptimizerService, randomIntProvider],
  exports: [OptimizerService],
})
export class OptimizerModule {}
