import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import optimizerConfig, { validateEnv } from './config/config';
import { OptimizerModule } from './optimizer/optimizer.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [`.env.${process.env.NODE_ENV || 'development'}`, '.env'],
      load: [optimizerConfig],
      validate: validateEnv,
    }),
    OptimizerModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
