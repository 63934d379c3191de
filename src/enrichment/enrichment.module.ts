import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { SubmissionsStoreModule } from '../submissions/submissions-store.module';
import { EnrichmentExecutor } from './enrichment.executor';
import { EnrichmentService } from './enrichment.service';
import { HeuristicClassifierService } from './heuristic-classifier.service';

@Module({
  imports: [AiModule, SubmissionsStoreModule],
  providers: [HeuristicClassifierService, EnrichmentService, EnrichmentExecutor],
  exports: [EnrichmentExecutor],
})
export class EnrichmentModule {}
