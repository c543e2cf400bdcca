/** Uppercased, trimmed, de-duplicated tickers in first-seen order. */
export function normalizeTickers(tickers: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const ticker of tickers) {
    const symbol = ticker.trim().toUpperCase();
    if (symbol) {
      seen.add(symbol);
    }
  }
  return [...seen];
}

export function assertPositiveDays(days: number): void {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`days must be a positive integer, got ${days}`);
  }
}
