import { ConfigService } from '@nestjs/config';
import { AppConfigService } from '../app/app-config.service';
import { HashtagHistoryService } from './hashtag-history.service';

function makeService(maxEntries = '10') {
  const appConfig = new AppConfigService(new ConfigService({ HASHTAG_HISTORY_MAX_ENTRIES: maxEntries }));
  return new HashtagHistoryService(appConfig);
}

describe('HashtagHistoryService', () => {
  it('stores a frozen copy with id and timestamp', () => {
    const svc = makeService();
    const hashtags = ['#a', '#b'];
    const entry = svc.append({ model: 'm', count: 2, hashtags }, new Date('2026-01-02T03:04:05.000Z'));
    hashtags.push('#c');

    expect(entry.createdAt).toBe('2026-01-02T03:04:05.000Z');
    expect(typeof entry.id).toBe('string');
    expect(entry.id.length).toBeGreaterThan(0);
    expect(entry.hashtags).toEqual(['#a', '#b']);
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.hashtags)).toBe(true);
  });

  it('lists oldest first and limits to the most recent entries', () => {
    const svc = makeService();
    svc.append({ model: 'm', count: 1, hashtags: ['#one'] });
    svc.append({ model: 'm', count: 1, hashtags: ['#two'] });
    svc.append({ model: 'm', count: 1, hashtags: ['#three'] });

    expect(svc.list().map((e) => e.hashtags[0])).toEqual(['#one', '#two', '#three']);
    expect(svc.list(2).map((e) => e.hashtags[0])).toEqual(['#two', '#three']);
    expect(svc.list(0)).toEqual([]);
  });

  it('returns a snapshot that callers cannot use to modify the log', () => {
    const svc = makeService();
    svc.append({ model: 'm', count: 1, hashtags: ['#one'] });
    const snapshot = svc.list();
    snapshot.pop();
    expect(svc.size()).toBe(1);
  });

  it('evicts the oldest entries past the cap', () => {
    const svc = makeService('2');
    svc.append({ model: 'm', count: 1, hashtags: ['#one'] });
    svc.append({ model: 'm', count: 1, hashtags: ['#two'] });
    svc.append({ model: 'm', count: 1, hashtags: ['#three'] });
    expect(svc.size()).toBe(2);
    expect(svc.list().map((e) => e.hashtags[0])).toEqual(['#two', '#three']);
  });
});
