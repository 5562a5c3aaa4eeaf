export interface RankedHit {
  readonly id: string;
  /** Used to break score ties: newer wins. */
  readonly timestamp: number;
}

export interface FusedHit {
  readonly id: string;
  readonly timestamp: number;
  readonly score: number;
}

export interface FusionOptions {
  readonly k: number;
  /** Rank assumed for a hit that a list does not contain. */
  readonly missingRank: number;
}

/**
 * Reciprocal-rank fusion. Each hit scores Σ 1/(k + rank) over every list,
 * with 1-based ranks. Ties go to the newer hit, then to the smaller id.
 */
export function reciprocalRankFusion(lists: readonly (readonly RankedHit[])[], opts: FusionOptions): FusedHit[] {
  const ranks = lists.map((list) => {
    const byId = new Map<string, number>();
    list.forEach((hit, index) => {
      if (!byId.has(hit.id)) byId.set(hit.id, index + 1);
    });
    return byId;
  });

  const timestamps = new Map<string, number>();
  for (const list of lists) {
    for (const hit of list) {
      timestamps.set(hit.id, Math.max(timestamps.get(hit.id) ?? hit.timestamp, hit.timestamp));
    }
  }

  const fused: FusedHit[] = [];
  for (const [id, timestamp] of timestamps) {
    let score = 0;
    for (const byId of ranks) {
      score += 1 / (opts.k + (byId.get(id) ?? opts.missingRank));
    }
    fused.push({ id, timestamp, score });
  }

  return fused.sort((a, b) => b.score - a.score || b.timestamp - a.timestamp || compareIds(a.id, b.id));
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
