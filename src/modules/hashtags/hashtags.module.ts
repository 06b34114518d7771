import { Module } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { HashtagHistoryService } from './hashtag-history.service';
import { HashtagsController } from './hashtags.controller';
import { HashtagsService } from './hashtags.service';

@Module({
  imports: [OllamaModule],
  controllers: [HashtagsController],
  providers: [HashtagsService, HashtagHistoryService],
  exports: [HashtagHistoryService],
})
export class HashtagsModule {}
