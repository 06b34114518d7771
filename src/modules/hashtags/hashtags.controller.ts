import { Body, Controller, Get, Post, Query, Res } from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import { z } from 'zod';
import { setNoStore, type HeaderSink } from '../../common/http-cache';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { HashtagsService } from './hashtags.service';

const MAX_HASHTAG_COUNT = 30;

const generateSchema = z.object({
  text: z.string().trim().min(1, 'text is required').max(4000),
  count: z.coerce.number().int().min(1).max(MAX_HASHTAG_COUNT).default(10),
  model: z.string().trim().min(1, 'model must not be empty').max(200).optional(),
});

const historySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

@Controller('hashtags')
export class HashtagsController {
  constructor(private readonly hashtags: HashtagsService) {}

  @Throttle({
    default: {
      limit: rateLimitLimit('generate', 20),
      ttl: rateLimitTtl('generate', 60_000),
    },
  })
  @Post()
  async generate(@Body() body: unknown) {
    const parsed = generateSchema.parse(body);
    const result = await this.hashtags.generate({ text: parsed.text, count: parsed.count, model: parsed.model ?? null });
    return { data: result };
  }

  @Get()
  history(@Query() query: unknown, @Res({ passthrough: true }) httpRes: HeaderSink) {
    const parsed = historySchema.parse(query);
    setNoStore(httpRes);
    return { data: this.hashtags.listHistory(parsed.limit) };
  }
}
