/**
 * Scores how well a query matches a title. Higher is better; `null` means
 * no match at all.
 */
export type TitleMatcher = {
  score(title: string, query: string): number | null;
};

export type FuzzyMatcherOptions = {
  /** Points per matched character. Default: 10 */
  charScore?: number;
  /** Bonus when a match directly follows the previous one. Default: 15 */
  consecutiveBonus?: number;
  /** Bonus when a match starts a word. Default: 20 */
  wordStartBonus?: number;
};

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

/**
 * Case-insensitive subsequence matcher. Characters are matched greedily,
 * left to right.
 */
export function createFuzzyMatcher(options: FuzzyMatcherOptions = {}): TitleMatcher {
  const { charScore = 10, consecutiveBonus = 15, wordStartBonus = 20 } = options;

  return {
    score(title, query) {
      const needle = query.trim().toLowerCase();
      if (!needle) return null;
      const haystack = title.toLowerCase();

      let score = 0;
      let from = 0;
      let previous = -2;
      for (const ch of needle) {
        const index = haystack.indexOf(ch, from);
        if (index === -1) return null;

        score += charScore;
        if (index === previous + 1) score += consecutiveBonus;
        const before = index === 0 ? '' : haystack.charAt(index - 1);
        if (ALPHANUMERIC.test(ch) && !ALPHANUMERIC.test(before)) score += wordStartBonus;

        previous = index;
        from = index + ch.length;
      }
      return score;
    },
  };
}

export type RankedMatch<T> = {
  item: T;
  score: number;
};

/**
 * Score every item and return the matches, best first. Ties keep input order.
 */
export function rankMatches<T>(
  items: readonly T[],
  query: string,
  titleOf: (item: T) => string,
  matcher: TitleMatcher,
): RankedMatch<T>[] {
  const ranked: RankedMatch<T>[] = [];
  for (const item of items) {
    const score = matcher.score(titleOf(item), query);
    if (score !== null) ranked.push({ item, score });
  }
  return ranked.sort((a, b) => b.score - a.score);
}
