import { Module } from '@nestjs/common';
import { HashtagsModule } from '../hashtags/hashtags.module';
import { OllamaModule } from '../ollama/ollama.module';
import { HealthController } from './health.controller';

@Module({
  imports: [OllamaModule, HashtagsModule],
  controllers: [HealthController],
})
export class HealthModule {}
