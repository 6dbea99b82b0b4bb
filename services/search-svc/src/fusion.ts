import type { ScoredPoint } from './types';

export interface RankedCandidate {
  id: string;
  score: number;
  denseRank: number | null;
  sparseRank: number | null;
}

export type Branch = 'dense' | 'sparse';

/** 1-based ranks by descending score; equal scores keep their incoming order. */
export function assignRanks(points: readonly ScoredPoint[]): Map<string, number> {
  const ordered = points
    .map((point, position) => ({ point, position }))
    .sort((left, right) => right.point.score - left.point.score || left.position - right.position);

  const ranks = new Map<string, number>();
  for (const { point } of ordered) {
    if (!ranks.has(point.id)) {
      ranks.set(point.id, ranks.size + 1);
    }
  }
  return ranks;
}

/** Present ranks sort before absent ones. */
function compareRanks(left: number | null, right: number | null): number {
  if (left === right) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  return left - right;
}

/** Descending score, then dense rank, then sparse rank, then identifier. */
export function compareCandidates(left: RankedCandidate, right: RankedCandidate): number {
  if (right.score !== left.score) {
    return right.score - left.score;
  }

  return (
    compareRanks(left.denseRank, right.denseRank) ||
    compareRanks(left.sparseRank, right.sparseRank) ||
    (left.id < right.id ? -1 : left.id > right.id ? 1 : 0)
  );
}

/** Single-branch results keep the branch score as-is. */
export function rankSingleBranch(points: readonly ScoredPoint[], branch: Branch): RankedCandidate[] {
  const ranks = assignRanks(points);
  const best = new Map<string, number>();
  for (const point of points) {
    if (!best.has(point.id)) {
      best.set(point.id, point.score);
    }
  }

  return [...ranks.entries()]
    .map(([id, rank]) => ({
      id,
      score: best.get(id) ?? 0,
      denseRank: branch === 'dense' ? rank : null,
      sparseRank: branch === 'sparse' ? rank : null
    }))
    .sort(compareCandidates);
}

/**
 * Reciprocal Rank Fusion of the dense and sparse branches. A candidate absent
 * from a branch gets no contribution from it. Scores are divided by the
 * best attainable sum, `2 / (rrfK + 1)`, so they fall in [0, 1].
 */
export function fuseReciprocalRank(
  dense: readonly ScoredPoint[],
  sparse: readonly ScoredPoint[],
  rrfK: number
): RankedCandidate[] {
  const denseRanks = assignRanks(dense);
  const sparseRanks = assignRanks(sparse);
  const maxScore = 2 / (rrfK + 1);

  const ids = new Set<string>([...denseRanks.keys(), ...sparseRanks.keys()]);
  const fused: RankedCandidate[] = [];

  for (const id of ids) {
    const denseRank = denseRanks.get(id) ?? null;
    const sparseRank = sparseRanks.get(id) ?? null;
    const contribution =
      (denseRank === null ? 0 : 1 / (rrfK + denseRank)) + (sparseRank === null ? 0 : 1 / (rrfK + sparseRank));

    fused.push({ id, score: contribution / maxScore, denseRank, sparseRank });
  }

  return fused.sort(compareCandidates);
}
