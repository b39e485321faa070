import { Module, Provider } from '@nestjs/common';
import { InMemoryStoreService } from '../common/in-memory-store.service';
import { LlmModule } from '../llm/llm.module';
import { TtsModule } from '../tts/tts.module';
import { DebateOrchestratorService } from './debate-orchestrator.service';
import { DEBATE_SESSIONS_REPOSITORY } from './debate-sessions.repository';
import { DebateSessionsService } from './debate-sessions.service';
import { DebateController } from './debate.controller';
import { InMemoryDebateSessionsRepository } from './in-memory-debate-sessions.repository';

const debateSessionsRepositoryProvider: Provider = {
  provide: DEBATE_SESSIONS_REPOSITORY,
  inject: [InMemoryStoreService],
  useFactory: (store: InMemoryStoreService) => new InMemoryDebateSessionsRepository(store),
};

@Module({
  imports: [LlmModule, TtsModule],
  providers: [DebateOrchestratorService, DebateSessionsService, debateSessionsRepositoryProvider],
  controllers: [DebateController],
  exports: [DebateOrchestratorService],
})
export class DebateModule {}
