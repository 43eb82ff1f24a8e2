import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from '../../config/config.module';
import { AppConfig } from '../../config/configuration';
import { PinoLoggerService } from './pino-logger.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PinoLoggerService,
      useFactory: (configService: ConfigService<AppConfig>) =>
        PinoLoggerService.fromConfig(configService),
      inject: [ConfigService],
    },
  ],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
