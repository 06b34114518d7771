import { ConfigService } from '@nestjs/config';
import { GenerationError } from '../../common/errors/generation-error';
import { AppConfigService } from '../app/app-config.service';
import { OllamaClient } from '../ollama/ollama.client';
import { HashtagHistoryService } from './hashtag-history.service';
import { buildHashtagPrompt } from './hashtag-prompt';
import { HashtagsService } from './hashtags.service';

function makeService() {
  const appConfig = new AppConfigService(
    new ConfigService({ OLLAMA_DEFAULT_MODEL: 'test-model', HASHTAG_LANGUAGE: 'English' }),
  );
  const ollama = new OllamaClient(appConfig);
  const generate = jest.spyOn(ollama, 'generate');
  const history = new HashtagHistoryService(appConfig);
  const svc = new HashtagsService(ollama, history, appConfig);
  return { svc, generate, history };
}

describe('HashtagsService.generate', () => {
  afterEach(() => jest.restoreAllMocks());

  it('prompts the default model, normalizes the reply and records it', async () => {
    const { svc, generate, history } = makeService();
    generate.mockResolvedValue({ response: '{"hashtags":["#viagem","#viagem","#praia"]}' });

    const result = await svc.generate({ text: 'viagem incrível pela praia', count: 4 });

    expect(result).toEqual({
      model: 'test-model',
      count: 4,
      hashtags: ['#viagem', '#praia', '#viagemincrível', '#incrívelpela'],
    });
    expect(generate).toHaveBeenCalledWith({
      model: 'test-model',
      prompt: buildHashtagPrompt({ text: 'viagem incrível pela praia', count: 4, model: 'test-model', language: 'English' }),
      format: 'json',
    });
    expect(history.list().map((e) => e.hashtags)).toEqual([result.hashtags]);
  });

  it('uses the requested model when given', async () => {
    const { svc, generate } = makeService();
    generate.mockResolvedValue({ hashtags: ['#a'] });

    const result = await svc.generate({ text: 'a b', count: 1, model: ' llama3 ' });

    expect(result.model).toBe('llama3');
    expect(generate.mock.calls[0]?.[0].model).toBe('llama3');
  });

  it('propagates upstream failures without touching history', async () => {
    const { svc, generate, history } = makeService();
    generate.mockRejectedValue(new GenerationError('UpstreamUnavailable', 'down'));

    await expect(svc.generate({ text: 'sol', count: 2 })).rejects.toMatchObject({ kind: 'UpstreamUnavailable' });
    expect(history.size()).toBe(0);
  });

  it('does not record failed pipelines', async () => {
    const { svc, generate, history } = makeService();
    generate.mockResolvedValue({ hashtags: [] });

    await expect(svc.generate({ text: '!!!', count: 2 })).rejects.toMatchObject({ kind: 'NoHashtagsProducible' });
    expect(history.size()).toBe(0);
  });

  it('lists history through the service', async () => {
    const { svc, generate } = makeService();
    generate.mockResolvedValue({ hashtags: ['#one'] });
    await svc.generate({ text: 'one', count: 1 });
    await svc.generate({ text: 'one', count: 1 });
    expect(svc.listHistory(1)).toHaveLength(1);
    expect(svc.listHistory()).toHaveLength(2);
  });
});
