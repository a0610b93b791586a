import { RegistryFrozenError, RigConfigurationError } from './errors';
import type { SkinRigType } from './metarig';
import { compareOwnershipRank, resolveOwnership, type OwnershipCandidate } from './ownershipResolver';
import { symmetryKey, type SymmetryKey } from './symmetryNaming';
import { distanceVec, type Quat, type Vec3 } from './vectorMath';

export const DEFAULT_MERGE_TOLERANCE = 1e-4;

export type ControlRole = 'anchor' | 'end' | 'middle' | 'tweak';

export interface ChainIdentity {
  /** Base bone of the generator. */
  id: string;
  kind: SkinRigType;
  /** Ancestors of the base bone in the metarig. */
  depth: number;
  priority: number;
}

export interface ControlPointRequest {
  chain: ChainIdentity;
  index: number;
  name: string;
  orgBone: string;
  position: Vec3;
  orientation: Quat;
  size: number;
  role: ControlRole;
  /** Registrations only merge inside the same scope. */
  mergeScope: string;
  priority?: number;
  mergeParentTransform?: boolean;
}

/** Opaque ticket returned by `register`; resolves to a node once frozen. */
export class NodeHandle {
  constructor(readonly id: number) {
    Object.freeze(this);
  }
}

export interface NodeClaim extends OwnershipCandidate {
  readonly handle: NodeHandle;
  readonly chain: ChainIdentity;
  readonly index: number;
  readonly name: string;
  readonly orgBone: string;
  readonly position: Vec3;
  readonly orientation: Quat;
  readonly size: number;
  readonly role: ControlRole;
  readonly mergeScope: string;
  readonly priority: number;
  readonly mergeParentTransform: boolean;
  readonly symmetry: SymmetryKey;
}

export interface ControlNode {
  readonly id: number;
  /** Name of the control bone; taken from the owning claim. */
  readonly name: string;
  readonly position: Vec3;
  readonly orientation: Quat;
  readonly mergeScope: string;
  /** Best first; the first entry is the owner. */
  readonly claims: readonly NodeClaim[];
  readonly owner: NodeClaim;
  readonly symmetryGroup: readonly NodeClaim[] | null;
  readonly priority: number;
  readonly mergeParentTransform: boolean;
}

export type RegistryPhase = 'collecting' | 'frozen';

const logicalKey = (chainId: string, index: number) => `${chainId}#${index}`;

class DisjointSet {
  private readonly parent: number[] = [];

  add(): number {
    this.parent.push(this.parent.length);
    return this.parent.length - 1;
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    let current = i;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // Lower index becomes the root so the structure does not depend on call order.
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

/**
 * Collects control point requests from every generator, then freezes into
 * merged, owner-resolved nodes. Writes after the freeze are rejected.
 */
export class ControlNodeRegistry {
  private phase: RegistryPhase = 'collecting';
  private readonly claims: NodeClaim[] = [];
  private readonly claimByLogicalKey = new Map<string, NodeClaim>();
  private readonly nodeByClaim = new Map<number, ControlNode>();
  private nodes: ControlNode[] = [];

  constructor(readonly tolerance: number = DEFAULT_MERGE_TOLERANCE) {
    if (!(tolerance > 0)) {
      throw new RigConfigurationError(`Merge tolerance must be positive, got ${tolerance}`);
    }
  }

  get currentPhase(): RegistryPhase {
    return this.phase;
  }

  register(request: ControlPointRequest): NodeHandle {
    if (this.phase === 'frozen') {
      throw new RegistryFrozenError(request.name);
    }

    const key = logicalKey(request.chain.id, request.index);
    const existing = this.claimByLogicalKey.get(key);
    if (existing) {
      if (distanceVec(existing.position, request.position) > this.tolerance) {
        throw new RigConfigurationError(
          `Control point ${request.index} registered twice at different positions`,
          { bone: request.orgBone, generator: request.chain.kind }
        );
      }
      return existing.handle;
    }

    const handle = new NodeHandle(this.claims.length);
    const claim: NodeClaim = Object.freeze({
      handle,
      chain: Object.freeze({ ...request.chain }),
      index: request.index,
      name: request.name,
      orgBone: request.orgBone,
      position: Object.freeze({ ...request.position }),
      orientation: Object.freeze({ ...request.orientation }),
      size: request.size,
      role: request.role,
      mergeScope: request.mergeScope,
      priority: request.priority ?? request.chain.priority,
      mergeParentTransform: request.mergeParentTransform ?? false,
      symmetry: symmetryKey(request.name),
    });
    this.claims.push(claim);
    this.claimByLogicalKey.set(key, claim);
    return handle;
  }

  /** Merges coincident claims and resolves every node's owner. */
  freeze(): readonly ControlNode[] {
    if (this.phase === 'frozen') {
      return this.nodes;
    }
    this.phase = 'frozen';

    const sets = new DisjointSet();
    this.claims.forEach(() => sets.add());

    const cells = new Map<string, number[]>();
    const cellOf = (v: Vec3) => [v.x, v.y, v.z].map((c) => Math.floor(c / this.tolerance));
    const isAnchor = (i: number) => this.claims[i].chain.kind === 'skin.anchor';
    // Anchors never merge into another node; other claims may merge into one anchor.
    const anchorContacts: Array<[number, number]> = [];

    this.claims.forEach((claim, i) => {
      const [cx, cy, cz] = cellOf(claim.position);
      for (let dx = -1; dx <= 1; dx += 1) {
        for (let dy = -1; dy <= 1; dy += 1) {
          for (let dz = -1; dz <= 1; dz += 1) {
            const bucket = cells.get(`${claim.mergeScope}|${cx + dx}|${cy + dy}|${cz + dz}`);
            bucket?.forEach((j) => {
              if (distanceVec(this.claims[j].position, claim.position) > this.tolerance) return;
              if (!isAnchor(i) && !isAnchor(j)) sets.union(i, j);
              else if (!isAnchor(i)) anchorContacts.push([i, j]);
              else if (!isAnchor(j)) anchorContacts.push([j, i]);
            });
          }
        }
      }
      const own = `${claim.mergeScope}|${cx}|${cy}|${cz}`;
      const bucket = cells.get(own);
      if (bucket) bucket.push(i);
      else cells.set(own, [i]);
    });

    const anchorOfGroup = new Map<number, number>();
    anchorContacts.forEach(([member, anchor]) => {
      const root = sets.find(member);
      const current = anchorOfGroup.get(root);
      if (current === undefined || compareOwnershipRank(this.claims[anchor], this.claims[current]) < 0) {
        anchorOfGroup.set(root, anchor);
      }
    });
    anchorOfGroup.forEach((anchor, root) => sets.union(root, anchor));

    const groups = new Map<number, NodeClaim[]>();
    this.claims.forEach((claim, i) => {
      const root = sets.find(i);
      const group = groups.get(root);
      if (group) group.push(claim);
      else groups.set(root, [claim]);
    });

    const resolutions = Array.from(groups.values()).map((group) => resolveOwnership(group));

    resolutions.sort((a, b) => (a.owner.name < b.owner.name ? -1 : a.owner.name > b.owner.name ? 1 : 0));

    const seenNames = new Set<string>();
    this.nodes = resolutions.map((resolution, id) => {
      const { owner } = resolution;
      if (seenNames.has(owner.name)) {
        throw new RigConfigurationError(`Two separate control nodes are both named "${owner.name}"`, {
          bone: owner.orgBone,
          generator: owner.chain.kind,
        });
      }
      seenNames.add(owner.name);

      const node: ControlNode = Object.freeze({
        id,
        name: owner.name,
        position: owner.position,
        orientation: owner.orientation,
        mergeScope: owner.mergeScope,
        claims: Object.freeze(resolution.ranked),
        owner,
        symmetryGroup: resolution.symmetryGroup ? Object.freeze(resolution.symmetryGroup) : null,
        priority: owner.priority,
        mergeParentTransform: owner.mergeParentTransform,
      });
      node.claims.forEach((claim) => this.nodeByClaim.set(claim.handle.id, node));
      return node;
    });

    return this.nodes;
  }

  getNodes(): readonly ControlNode[] {
    this.assertFrozen('read nodes');
    return this.nodes;
  }

  node(handle: NodeHandle): ControlNode {
    this.assertFrozen('resolve a handle');
    const node = this.nodeByClaim.get(handle.id);
    if (!node) {
      throw new Error(`Unknown node handle ${handle.id}`);
    }
    return node;
  }

  claim(handle: NodeHandle): NodeClaim {
    const claim = this.claims[handle.id];
    if (!claim || claim.handle !== handle) {
      throw new Error(`Unknown node handle ${handle.id}`);
    }
    return claim;
  }

  /** Frozen-phase lookup for query-only consumers such as glue bones. */
  query(position: Vec3, mergeScope: string): ControlNode | null {
    this.assertFrozen('query positions');
    let best: ControlNode | null = null;
    let bestDistance = Infinity;
    for (const node of this.nodes) {
      if (node.mergeScope !== mergeScope) continue;
      for (const claim of node.claims) {
        const d = distanceVec(claim.position, position);
        if (d <= this.tolerance && d < bestDistance) {
          best = node;
          bestDistance = d;
        }
      }
    }
    return best;
  }

  private assertFrozen(action: string): void {
    if (this.phase !== 'frozen') {
      throw new Error(`Cannot ${action} before the registry is frozen`);
    }
  }
}
