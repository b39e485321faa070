import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { AppConfigModule } from './config/app-config.module';
import { DebateModule } from './debate/debate.module';
import { LlmModule } from './llm/llm.module';
import { StorageModule } from './storage/storage.module';
import { TtsModule } from './tts/tts.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    AppConfigModule,
    CommonModule,
    LlmModule,
    TtsModule,
    StorageModule,
    DebateModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
