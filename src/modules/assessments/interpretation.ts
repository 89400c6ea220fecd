export type Band<L extends string> = { max: number; label: L };

export type RankGroup<K extends string> = {
  rank: number;
  score: number;
  members: K[];
};

/** First band whose inclusive `max` covers the value, `above` past the last one. */
export function bandFor<L extends string>(value: number, bands: readonly Band<L>[], above: L): L {
  const band = bands.find((b) => value <= b.max);
  return band ? band.label : above;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function percentOf(part: number, whole: number, digits = 1): number {
  if (whole === 0) return 0;
  return roundTo((part / whole) * 100, digits);
}

const byId = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Score descending, key ascending on equal scores. */
export function orderByScore<K extends string>(keys: readonly K[], scoreOf: (key: K) => number): K[] {
  return [...keys].sort((a, b) => scoreOf(b) - scoreOf(a) || byId(a, b));
}

/** Groups keys sharing a score; rank is dense (1, 2, 3...) across groups. */
export function groupByScore<K extends string>(keys: readonly K[], scoreOf: (key: K) => number): RankGroup<K>[] {
  const groups: RankGroup<K>[] = [];
  for (const key of orderByScore(keys, scoreOf)) {
    const score = scoreOf(key);
    const current = groups[groups.length - 1];
    if (current && current.score === score) {
      current.members.push(key);
    } else {
      groups.push({ rank: groups.length + 1, score, members: [key] });
    }
  }
  return groups;
}

export function keysWithScore<K extends string>(keys: readonly K[], scoreOf: (key: K) => number, score: number): K[] {
  return keys.filter((key) => scoreOf(key) === score).sort(byId);
}
