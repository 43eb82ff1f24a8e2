import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Worker and logging settings come from the process environment, or from a
 * `.env` file in the working directory. `configuration` validates them once
 * and exposes the typed AppConfig.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
      cache: true,
    }),
  ],
  exports: [NestConfigModule],
})
export class ConfigModule {}
