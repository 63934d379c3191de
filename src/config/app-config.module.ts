import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APP_CONFIG, buildAppConfig } from './app.config';

@Global()
@Module({
  providers: [
    {
      provide: APP_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildAppConfig((key) => configService.get<string>(key)),
    },
  ],
  exports: [APP_CONFIG],
})
export class AppConfigModule {}
