import { filterRelevant } from './relevance-filter';

const titles = (...values: string[]) => values.map((title) => ({ title }));

describe('filterRelevant', () => {
  const substring = { minRetention: 0.1, matchMode: 'substring' as const };
  const word = { minRetention: 0.1, matchMode: 'word' as const };

  it('should keep titles naming the ticker or the company', () => {
    const result = filterRelevant('AAPL', 'Apple', titles('Apple unveils a phone', 'AAPL rallies', 'Markets drift'), substring);

    expect(result.kept.map((item) => item.title)).toEqual(['Apple unveils a phone', 'AAPL rallies']);
    expect(result.fellBack).toBe(false);
  });

  it('should ignore case', () => {
    const result = filterRelevant('AAPL', 'Apple', titles('why aapl slid', 'APPLE news'), substring);
    expect(result.kept).toHaveLength(2);
  });

  it('should only match whole words in word mode', () => {
    const items = titles('Applesauce sales jump', 'Apple, again', 'Pineapple prices', 'Is AAPL cheap?');

    expect(filterRelevant('AAPL', 'Apple', items, substring).matched).toBe(4);
    expect(filterRelevant('AAPL', 'Apple', items, word).kept.map((item) => item.title)).toEqual([
      'Apple, again',
      'Is AAPL cheap?',
    ]);
  });

  it('should keep everything when too few titles match', () => {
    const items = titles('Apple up', ...Array.from({ length: 19 }, (_, i) => `Market wrap ${i}`));

    const result = filterRelevant('AAPL', 'Apple', items, substring);

    expect(result.matched).toBe(1);
    expect(result.fellBack).toBe(true);
    expect(result.kept).toHaveLength(20);
  });

  it('should filter when exactly the minimum share matches', () => {
    const items = titles('Apple up', ...Array.from({ length: 9 }, (_, i) => `Market wrap ${i}`));

    const result = filterRelevant('AAPL', 'Apple', items, substring);

    expect(result.fellBack).toBe(false);
    expect(result.kept.map((item) => item.title)).toEqual(['Apple up']);
  });

  it('should fall back to every title when nothing matches', () => {
    const result = filterRelevant('MSFT', undefined, titles('Oil climbs', 'Bonds rally'), substring);
    expect(result.fellBack).toBe(true);
    expect(result.kept).toHaveLength(2);
  });
});
