import type { SkinRigType } from './metarig';
import { areSymmetrySiblings, hasSymmetryMarkers, sameSymmetryBase, type SymmetryKey } from './symmetryNaming';

export interface OwnershipCandidate {
  name: string;
  index: number;
  priority: number;
  symmetry: SymmetryKey;
  chain: {
    id: string;
    kind: SkinRigType;
    depth: number;
  };
}

/**
 * Total order key, ascending wins:
 * anchor tier, explicit priority (negated so higher wins), parent depth,
 * symmetry marker tier, then name, chain and index for full determinism.
 */
export type OwnershipRankKey = readonly [number, number, number, number, string, string, number];

export interface OwnershipResolution<C extends OwnershipCandidate> {
  owner: C;
  /** All candidates, best first. */
  ranked: C[];
  /** Owner plus mirrored claims of the same generator kind, one per tag set. */
  symmetryGroup: C[] | null;
}

export const ownershipRankKey = (candidate: OwnershipCandidate): OwnershipRankKey => [
  candidate.chain.kind === 'skin.anchor' ? 0 : 1,
  -candidate.priority,
  candidate.chain.depth,
  hasSymmetryMarkers(candidate.symmetry) ? 0 : 1,
  candidate.name,
  candidate.chain.id,
  candidate.index,
];

const compareValues = (a: number | string, b: number | string): number => {
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

export const compareRankKeys = (a: OwnershipRankKey, b: OwnershipRankKey): number => {
  for (let i = 0; i < a.length; i += 1) {
    const result = compareValues(a[i], b[i]);
    if (result !== 0) return result;
  }
  return 0;
};

export const compareOwnershipRank = (a: OwnershipCandidate, b: OwnershipCandidate): number =>
  compareRankKeys(ownershipRankKey(a), ownershipRankKey(b));

const sideKey = (key: SymmetryKey): string => `${key.lr}:${key.fb}`;

export const findSymmetryGroup = <C extends OwnershipCandidate>(owner: C, ranked: C[]): C[] | null => {
  const seen = new Set<string>([sideKey(owner.symmetry)]);
  const group: C[] = [owner];

  ranked.forEach((candidate) => {
    if (candidate === owner || candidate.chain.kind !== owner.chain.kind) return;
    if (!areSymmetrySiblings(owner.symmetry, candidate.symmetry)) return;
    const key = sideKey(candidate.symmetry);
    if (seen.has(key)) return;
    seen.add(key);
    group.push(candidate);
  });

  return group.length > 1 ? group : null;
};

export const resolveOwnership = <C extends OwnershipCandidate>(candidates: readonly C[]): OwnershipResolution<C> => {
  if (candidates.length === 0) {
    throw new Error('Cannot resolve ownership of a node without claims');
  }
  const ranked = [...candidates].sort(compareOwnershipRank);
  const owner = ranked[0];
  return { owner, ranked, symmetryGroup: findSymmetryGroup(owner, ranked) };
};

/**
 * Best mirrored counterpart of a claim among the claims of one node:
 * mirrored on both axes first, then left/right only, then front/back only.
 */
export const findMirrorClaim = <C extends OwnershipCandidate>(claim: C, ranked: readonly C[]): C | null => {
  const { lr, fb } = claim.symmetry;
  const flips: Array<[number, number]> = [
    [-lr, -fb],
    [-lr, fb],
    [lr, -fb],
  ];

  for (const [wantLr, wantFb] of flips) {
    if (wantLr === lr && wantFb === fb) continue;
    const mirror = ranked.find(
      (candidate) =>
        candidate !== claim &&
        sameSymmetryBase(candidate.symmetry, claim.symmetry) &&
        candidate.symmetry.lr === wantLr &&
        candidate.symmetry.fb === wantFb
    );
    if (mirror) return mirror;
  }
  return null;
};
