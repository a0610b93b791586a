import type { AnchorParams, BasicChainParams, GlueParams, StretchyChainParams } from './adapters/metarigSchema';
import { RigConfigurationError } from './errors';
import {
  IDENTITY_QUAT,
  crossVec,
  distanceVec,
  dotVec,
  multiplyQuat,
  normalizeVec,
  quatFromAxisAngle,
  rotateVec,
  subVec,
  vec3,
  type Quat,
  type Vec3,
} from './vectorMath';

// ─── TYPES (shared by the schema adapter, generators and the rig builder) ────
export type SkinRigType = 'skin.basic_chain' | 'skin.stretchy_chain' | 'skin.anchor' | 'skin.glue';

export type SkinRigSpec =
  | { type: 'skin.basic_chain'; params: BasicChainParams }
  | { type: 'skin.stretchy_chain'; params: StretchyChainParams }
  | { type: 'skin.anchor'; params: AnchorParams }
  | { type: 'skin.glue'; params: GlueParams }
  | { type: 'external'; tag: string };

export interface MetarigConstraint {
  name: string;
  kind: string;
  subtargets: string[];
  influence: number;
  settings: Record<string, number | string | boolean>;
}

export interface MetarigBone {
  name: string;
  parent: string | null;
  head: Vec3;
  tail: Vec3;
  roll: number;
  connected: boolean;
  rigType: string | null;
  rig: SkinRigSpec | null;
  constraints: MetarigConstraint[];
}

export interface Metarig {
  name: string;
  bones: MetarigBone[];
}

export interface BoneFrame {
  x: Vec3;
  y: Vec3;
  z: Vec3;
  rotation: Quat;
}

const UNIT_X = vec3(1, 0, 0);
const UNIT_Y = vec3(0, 1, 0);
const UNIT_Z = vec3(0, 0, 1);

/** Rest orientation of a bone: +Y along head→tail, then rolled around that axis. */
export const computeBoneFrame = (head: Vec3, tail: Vec3, roll: number): BoneFrame => {
  const y = normalizeVec(subVec(tail, head)) ?? UNIT_Y;
  const d = dotVec(UNIT_Y, y);

  let align: Quat;
  if (d > 1 - 1e-9) {
    align = { ...IDENTITY_QUAT };
  } else if (d < -1 + 1e-9) {
    align = quatFromAxisAngle(UNIT_Z, Math.PI);
  } else {
    align = quatFromAxisAngle(crossVec(UNIT_Y, y), Math.acos(d));
  }

  const rotation = multiplyQuat(quatFromAxisAngle(y, roll), align);
  return {
    x: rotateVec(UNIT_X, rotation),
    y,
    z: rotateVec(UNIT_Z, rotation),
    rotation,
  };
};

/** Read-only hierarchy view over a validated metarig. */
export class MetarigIndex {
  private readonly byName = new Map<string, MetarigBone>();
  private readonly childrenByName = new Map<string, string[]>();
  private readonly depthCache = new Map<string, number>();

  constructor(readonly metarig: Metarig) {
    metarig.bones.forEach((bone) => {
      this.byName.set(bone.name, bone);
      this.childrenByName.set(bone.name, []);
    });
    metarig.bones.forEach((bone) => {
      if (bone.parent) {
        this.childrenByName.get(bone.parent)?.push(bone.name);
      }
    });
    this.childrenByName.forEach((children) => children.sort());
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  bone(name: string): MetarigBone {
    const bone = this.byName.get(name);
    if (!bone) {
      throw new RigConfigurationError('Referenced bone does not exist', { bone: name });
    }
    return bone;
  }

  names(): string[] {
    return this.metarig.bones.map((bone) => bone.name);
  }

  parentOf(name: string): string | null {
    return this.bone(name).parent;
  }

  children(name: string): string[] {
    return [...(this.childrenByName.get(name) ?? [])];
  }

  /** Number of ancestors: a bone without a parent has depth 0. */
  depth(name: string): number {
    const cached = this.depthCache.get(name);
    if (cached !== undefined) return cached;
    const parent = this.parentOf(name);
    const depth = parent ? this.depth(parent) + 1 : 0;
    this.depthCache.set(name, depth);
    return depth;
  }

  /** Nearest first. */
  ancestors(name: string): string[] {
    const result: string[] = [];
    let current = this.parentOf(name);
    while (current) {
      result.push(current);
      current = this.parentOf(current);
    }
    return result;
  }

  rootOf(name: string): string {
    const ancestors = this.ancestors(name);
    return ancestors.length > 0 ? ancestors[ancestors.length - 1] : name;
  }

  /** The bone followed by its first connected child, repeatedly. */
  connectedChain(name: string): string[] {
    const chain = [name];
    let current = name;
    for (;;) {
      const next = this.children(current).find((child) => this.bone(child).connected);
      if (!next) break;
      chain.push(next);
      current = next;
    }
    return chain;
  }

  length(name: string): number {
    const bone = this.bone(name);
    return distanceVec(bone.head, bone.tail);
  }

  frame(name: string): BoneFrame {
    const bone = this.bone(name);
    return computeBoneFrame(bone.head, bone.tail, bone.roll);
  }
}
