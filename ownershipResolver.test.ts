import { describe, expect, it } from 'vitest';
import type { SkinRigType } from './metarig';
import {
  compareOwnershipRank,
  findMirrorClaim,
  findSymmetryGroup,
  ownershipRankKey,
  resolveOwnership,
  type OwnershipCandidate,
} from './ownershipResolver';
import { symmetryKey } from './symmetryNaming';

const candidate = (
  name: string,
  depth: number,
  options: { priority?: number; kind?: SkinRigType; chain?: string; index?: number } = {}
): OwnershipCandidate => ({
  name,
  index: options.index ?? 0,
  priority: options.priority ?? 0,
  symmetry: symmetryKey(name),
  chain: {
    id: options.chain ?? name,
    kind: options.kind ?? 'skin.basic_chain',
    depth,
  },
});

describe('ownershipResolver', () => {
  it('prefers the chain closer to the skeleton root in any order', () => {
    const a = candidate('brow', 1);
    const b = candidate('lid', 2);
    expect(resolveOwnership([a, b]).owner).toBe(a);
    expect(resolveOwnership([b, a]).owner).toBe(a);
  });

  it('lets an explicit priority override a shallower chain', () => {
    const deep = candidate('lid', 4, { priority: 10 });
    const shallow = candidate('brow', 1);
    expect(resolveOwnership([shallow, deep]).owner).toBe(deep);
    expect(resolveOwnership([deep, shallow]).owner).toBe(deep);
  });

  it('always hands anchors the node', () => {
    const anchor = candidate('jaw_pin', 6, { kind: 'skin.anchor' });
    const chain = candidate('chin', 0, { priority: 100 });
    expect(resolveOwnership([chain, anchor]).owner).toBe(anchor);
  });

  it('uses symmetry markers before the name', () => {
    const plain = candidate('a_mid', 2);
    const tagged = candidate('z_corner.L', 2);
    expect(resolveOwnership([plain, tagged]).owner).toBe(tagged);
  });

  it('falls back to the name, then the chain and index', () => {
    const first = candidate('cheek', 2, { chain: 'b' });
    const second = candidate('cheek', 2, { chain: 'a' });
    expect(resolveOwnership([first, second]).owner).toBe(second);
    expect(compareOwnershipRank(candidate('x', 1, { index: 0 }), candidate('x', 1, { index: 1 }))).toBe(-1);
  });

  it('builds the rank tuple in precedence order', () => {
    expect(ownershipRankKey(candidate('lip.L', 3, { priority: 2, chain: 'lip.L', index: 4 }))).toEqual([
      1, -2, 3, 0, 'lip.L', 'lip.L', 4,
    ]);
  });

  it('gives the same ranking for every permutation', () => {
    const pool = [
      candidate('lip.L', 2),
      candidate('lip.R', 2),
      candidate('lip', 1),
      candidate('lip_end', 1, { priority: -1 }),
    ];
    const expected = resolveOwnership(pool).ranked.map((c) => c.name);
    const permutations = [
      [3, 2, 1, 0],
      [1, 3, 0, 2],
      [2, 0, 3, 1],
    ];
    permutations.forEach((order) => {
      expect(resolveOwnership(order.map((i) => pool[i])).ranked.map((c) => c.name)).toEqual(expected);
    });
    expect(expected).toEqual(['lip', 'lip.L', 'lip.R', 'lip_end']);
  });

  it('groups mirrored claims of the same generator kind', () => {
    const left = candidate('arm.L', 1);
    const right = candidate('arm.R', 1);
    const { owner, symmetryGroup } = resolveOwnership([right, left]);
    expect(owner).toBe(left);
    expect(symmetryGroup).toEqual([left, right]);
  });

  it('does not group mirrored claims of different kinds', () => {
    const left = candidate('arm.L', 1);
    const right = candidate('arm.R', 1, { kind: 'skin.stretchy_chain' });
    expect(findSymmetryGroup(left, [left, right])).toBeNull();
  });

  it('keeps one sibling per tag set', () => {
    const owner = candidate('lip.Fr.L', 1);
    const claims = [
      owner,
      candidate('lip.Fr.R', 1, { chain: 'c1' }),
      candidate('lip.Fr.R', 1, { chain: 'c2' }),
      candidate('lip.Bk.L', 1),
    ];
    expect(findSymmetryGroup(owner, claims)?.map((c) => `${c.name}/${c.chain.id}`)).toEqual([
      'lip.Fr.L/lip.Fr.L',
      'lip.Fr.R/c1',
      'lip.Bk.L/lip.Bk.L',
    ]);
  });

  it('finds the best mirror, both axes first', () => {
    const claim = candidate('lip.Fr.L', 1);
    const sideOnly = candidate('lip.Fr.R', 1);
    const both = candidate('lip.Bk.R', 1);
    expect(findMirrorClaim(claim, [claim, sideOnly, both])).toBe(both);
    expect(findMirrorClaim(claim, [claim, sideOnly])).toBe(sideOnly);
    expect(findMirrorClaim(candidate('nose', 0), [candidate('nose', 0)])).toBeNull();
  });
});
