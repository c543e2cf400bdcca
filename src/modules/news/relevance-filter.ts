import { RelevanceMatchMode } from '../../config/configuration';

export interface RelevancePolicy {
  /** Smallest share of fetched articles the filter may keep before it is bypassed. */
  minRetention: number;
  matchMode: RelevanceMatchMode;
}

export interface RelevanceResult<T> {
  kept: T[];
  matched: number;
  fellBack: boolean;
}

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function matcherFor(terms: string[], mode: RelevanceMatchMode): (title: string) => boolean {
  const needles = terms.map((term) => term.toLowerCase()).filter(Boolean);

  if (mode === 'word') {
    const patterns = needles.map((needle) => new RegExp(`(^|[^a-z0-9])${escapeRegExp(needle)}($|[^a-z0-9])`));
    return (title) => {
      const haystack = title.toLowerCase();
      return patterns.some((pattern) => pattern.test(haystack));
    };
  }

  return (title) => {
    const haystack = title.toLowerCase();
    return needles.some((needle) => haystack.includes(needle));
  };
}

/**
 * Keeps articles whose title mentions the ticker or its company name. When
 * that would leave fewer than `max(1, fetched * minRetention)` articles, the
 * filter is judged too strict and every article is kept.
 */
export function filterRelevant<T extends { title: string }>(
  ticker: string,
  companyName: string | undefined,
  articles: T[],
  policy: RelevancePolicy,
): RelevanceResult<T> {
  const matches = matcherFor([ticker, companyName ?? ''], policy.matchMode);
  const relevant = articles.filter((article) => matches(article.title));

  if (relevant.length < Math.max(1, articles.length * policy.minRetention)) {
    return { kept: articles, matched: relevant.length, fellBack: true };
  }
  return { kept: relevant, matched: relevant.length, fellBack: false };
}
