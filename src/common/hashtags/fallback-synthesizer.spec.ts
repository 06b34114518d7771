import { synthesizeHashtags } from './fallback-synthesizer';

describe('synthesizeHashtags', () => {
  it('uses placeholders when there are no keywords', () => {
    expect(synthesizeHashtags({ keywords: [], deficit: 3, used: [] })).toEqual(['#hashtag', '#hashtag2', '#hashtag3']);
  });

  it('skips placeholders already used (case-insensitive)', () => {
    expect(synthesizeHashtags({ keywords: [], deficit: 2, used: ['#HASHTAG', '#hashtag2'] })).toEqual([
      '#hashtag3',
      '#hashtag4',
    ]);
  });

  it('counts up a suffix for a single keyword', () => {
    expect(synthesizeHashtags({ keywords: ['praia'], deficit: 3, used: ['#praia'] })).toEqual([
      '#praia2',
      '#praia3',
      '#praia4',
    ]);
  });

  it('rotates keyword pairs', () => {
    expect(
      synthesizeHashtags({
        keywords: ['viagem', 'incrível', 'pela', 'praia'],
        deficit: 2,
        used: ['#viagem', '#praia'],
      }),
    ).toEqual(['#viagemincrível', '#incrívelpela']);
  });

  it('adds a numeric suffix every five attempts once pairs repeat', () => {
    expect(synthesizeHashtags({ keywords: ['sun', 'sea'], deficit: 4, used: [] })).toEqual([
      '#sunsea',
      '#seasun',
      '#seasun2',
      '#sunsea2',
    ]);
  });

  it('substitutes the placeholder word when a pair has no alphanumerics', () => {
    expect(synthesizeHashtags({ keywords: ['@@', '&&'], deficit: 2, used: [] })).toEqual(['#hashtag', '#2']);
  });

  it('is deterministic', () => {
    const params = { keywords: ['alpha', 'beta', 'gamma'], deficit: 7, used: ['#alphabeta'] };
    expect(synthesizeHashtags(params)).toEqual(synthesizeHashtags(params));
  });

  it('terminates past a large used set', () => {
    const used = Array.from({ length: 200 }, (_, i) => (i === 0 ? '#hashtag' : `#hashtag${i + 1}`));
    expect(synthesizeHashtags({ keywords: [], deficit: 3, used })).toEqual(['#hashtag201', '#hashtag202', '#hashtag203']);
  });

  it('returns exactly the deficit, unique among themselves and the used set', () => {
    const used = ['#ab', '#ba', '#ab2'];
    const out = synthesizeHashtags({ keywords: ['a', 'b'], deficit: 25, used });
    expect(out).toHaveLength(25);
    const keys = [...used, ...out].map((t) => t.toLowerCase());
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('returns nothing for a zero deficit', () => {
    expect(synthesizeHashtags({ keywords: ['sun'], deficit: 0, used: [] })).toEqual([]);
  });
});
