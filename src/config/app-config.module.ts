import { Global, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_CONFIG, AppConfig, buildAppConfig } from './app-config';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: APP_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): AppConfig => {
        const config = buildAppConfig(configService);
        new Logger('AppConfig').log(
          `Configured text=${config.textGeneration.provider}:${config.textGeneration.model}, ` +
            `speech=${config.speechSynthesis.provider}:${config.speechSynthesis.voice}, storage=${config.storage.driver}`,
        );
        return config;
      },
    },
  ],
  exports: [APP_CONFIG],
})
export class AppConfigModule {}
