import { Module } from '@nestjs/common';
import Groq from 'groq-sdk';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { ChatCompletionClient, GROQ_CLIENT, GroqService } from './groq.service';

@Module({
  providers: [
    {
      provide: GROQ_CLIENT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): ChatCompletionClient | null => {
        const { groqApiKey, timeoutMs, maxRetries } = config.enrichment;
        if (!groqApiKey) {
          return null;
        }
        return new Groq({ apiKey: groqApiKey, timeout: timeoutMs, maxRetries });
      },
    },
    GroqService,
  ],
  exports: [GroqService],
})
export class AiModule {}
