import { RigConfigurationError } from './errors';
import type { Quat, Vec3 } from './vectorMath';

export type BoneRole = 'root' | 'org' | 'ctrl' | 'mch' | 'def';
export type InheritScaleMode = 'FULL' | 'AVERAGE' | 'NONE';
export type BBoneHandleType = 'AUTO' | 'TANGENT';

export type ConstraintKind =
  | 'COPY_LOCATION'
  | 'COPY_ROTATION'
  | 'COPY_SCALE'
  | 'COPY_TRANSFORMS'
  | 'DAMPED_TRACK'
  | 'STRETCH_TO'
  | 'LIMIT_ROTATION'
  | 'ARMATURE'
  | (string & {});

export type ConstraintSetting = number | string | boolean;

export interface ConstraintTarget {
  bone: string;
  weight?: number;
}

export interface RigConstraint {
  kind: ConstraintKind;
  name: string;
  targets: ConstraintTarget[];
  influence: number;
  settings: Record<string, ConstraintSetting>;
}

export interface TransformVariable {
  type: 'TRANSFORMS';
  bone: string;
  channel: 'ROT_Y' | 'SCALE_X' | 'SCALE_Y' | 'SCALE_Z' | 'LOC_X' | 'LOC_Y' | 'LOC_Z';
  space: 'LOCAL' | 'WORLD';
  rotationMode?: 'SWING_TWIST_Y' | 'AUTO';
}

/** Reads a custom property of a bone. */
export interface PropertyVariable {
  type: 'SINGLE_PROP';
  bone: string;
  property: string;
}

export type DriverVariable = TransformVariable | PropertyVariable;

/** Runtime slider exposed on a generated bone. */
export interface RigProperty {
  value: number;
  min: number;
  max: number;
  description: string;
}

export interface RigDriver {
  property: string;
  index: number;
  expression: string;
  variables: Record<string, DriverVariable>;
}

export interface BBoneSettings {
  segments: number;
  handleTypeStart: BBoneHandleType;
  handleStart: string | null;
  handleTypeEnd: BBoneHandleType;
  handleEnd: string | null;
  easeIn: number;
  easeOut: number;
}

export interface RigBone {
  name: string;
  role: BoneRole;
  parent: string | null;
  useConnect: boolean;
  inheritScale: InheritScaleMode;
  head: Vec3;
  tail: Vec3;
  roll: number;
  /** Rest orientation when the bone was placed from a rotation rather than head/tail/roll. */
  rotation: Quat | null;
  deform: boolean;
  hidden: boolean;
  rotationMode: 'QUATERNION' | 'YXZ';
  bbone: BBoneSettings | null;
  constraints: RigConstraint[];
  drivers: RigDriver[];
  properties: Record<string, RigProperty>;
}

export interface NewBoneSpec {
  name: string;
  role: BoneRole;
  head: Vec3;
  tail: Vec3;
  roll?: number;
  rotation?: Quat | null;
  parent?: string | null;
  deform?: boolean;
}

export interface ConstraintParams {
  name?: string;
  targets?: Array<string | ConstraintTarget>;
  influence?: number;
  settings?: Record<string, ConstraintSetting>;
}

const cloneVec = (v: Vec3): Vec3 => ({ x: v.x, y: v.y, z: v.z });

/**
 * In-memory armature the generators write into. Mirrors the host primitives:
 * bone creation, parenting, constraints, drivers and custom properties.
 */
export class RigGraph {
  private readonly bones = new Map<string, RigBone>();

  has(name: string): boolean {
    return this.bones.has(name);
  }

  get(name: string): RigBone {
    const bone = this.bones.get(name);
    if (!bone) {
      throw new RigConfigurationError(`Bone "${name}" has not been generated`);
    }
    return bone;
  }

  list(): RigBone[] {
    return Array.from(this.bones.values());
  }

  byRole(role: BoneRole): RigBone[] {
    return this.list().filter((bone) => bone.role === role);
  }

  addBone(spec: NewBoneSpec): RigBone {
    if (this.bones.has(spec.name)) {
      throw new RigConfigurationError(`Bone "${spec.name}" is generated twice`, { bone: spec.name });
    }
    const bone: RigBone = {
      name: spec.name,
      role: spec.role,
      parent: spec.parent ?? null,
      useConnect: false,
      inheritScale: 'FULL',
      head: cloneVec(spec.head),
      tail: cloneVec(spec.tail),
      roll: spec.roll ?? 0,
      rotation: spec.rotation ?? null,
      deform: spec.deform ?? spec.role === 'def',
      hidden: false,
      rotationMode: 'QUATERNION',
      bbone: null,
      constraints: [],
      drivers: [],
      properties: {},
    };
    this.bones.set(bone.name, bone);
    return bone;
  }

  /** Copies rest placement only; constraints and drivers stay behind. */
  copyBone(source: string, name: string, role: BoneRole, overrides: Partial<NewBoneSpec> = {}): RigBone {
    const from = this.get(source);
    return this.addBone({
      name,
      role,
      head: from.head,
      tail: from.tail,
      roll: from.roll,
      rotation: from.rotation,
      parent: null,
      ...overrides,
    });
  }

  setParent(
    name: string,
    parent: string | null,
    options: { inheritScale?: InheritScaleMode; useConnect?: boolean } = {}
  ): void {
    const bone = this.get(name);
    bone.parent = parent;
    bone.useConnect = options.useConnect ?? false;
    bone.inheritScale = options.inheritScale ?? bone.inheritScale;
  }

  parentChain(names: string[], options: { inheritScale?: InheritScaleMode; useConnect?: boolean } = {}): void {
    names.slice(1).forEach((name, i) => this.setParent(name, names[i], options));
  }

  addConstraint(bone: string, kind: ConstraintKind, params: ConstraintParams = {}): RigConstraint {
    const owner = this.get(bone);
    const constraint: RigConstraint = {
      kind,
      name: params.name ?? kind.toLowerCase(),
      targets: (params.targets ?? []).map((target) => (typeof target === 'string' ? { bone: target } : { ...target })),
      influence: params.influence ?? 1,
      settings: { ...(params.settings ?? {}) },
    };
    owner.constraints.push(constraint);
    return constraint;
  }

  /** Appends an already built constraint, e.g. one moved from another bone. */
  attachConstraint(bone: string, constraint: RigConstraint): void {
    this.get(bone).constraints.push(constraint);
  }

  /** Removes and returns every constraint of a bone. */
  takeConstraints(bone: string): RigConstraint[] {
    const owner = this.get(bone);
    const taken = owner.constraints;
    owner.constraints = [];
    return taken;
  }

  addDriver(bone: string, driver: RigDriver): void {
    this.get(bone).drivers.push({ ...driver, variables: { ...driver.variables } });
  }

  defineProperty(bone: string, name: string, property: Partial<RigProperty> & { value: number }): RigProperty {
    const owner = this.get(bone);
    if (name in owner.properties) {
      throw new RigConfigurationError(`Property "${name}" is defined twice on "${bone}"`, { bone });
    }
    const defined: RigProperty = { min: 0, max: 1, description: '', ...property };
    owner.properties[name] = defined;
    return defined;
  }

  setBBone(bone: string, settings: Partial<BBoneSettings> & { segments: number }): BBoneSettings {
    const owner = this.get(bone);
    const merged: BBoneSettings = {
      handleTypeStart: 'AUTO',
      handleStart: null,
      handleTypeEnd: 'AUTO',
      handleEnd: null,
      easeIn: 1,
      easeOut: 1,
      ...(owner.bbone ?? {}),
      ...settings,
    };
    owner.bbone = merged;
    return merged;
  }

  /** Every reference to a bone that does not exist. */
  validate(): string[] {
    const problems: string[] = [];
    const check = (owner: string, what: string, target: string | null) => {
      if (target !== null && !this.bones.has(target)) {
        problems.push(`${owner}: ${what} references missing bone "${target}"`);
      }
    };

    this.bones.forEach((bone) => {
      check(bone.name, 'parent', bone.parent);
      bone.constraints.forEach((constraint) =>
        constraint.targets.forEach((target) => check(bone.name, `constraint ${constraint.name}`, target.bone))
      );
      bone.drivers.forEach((driver) =>
        Object.entries(driver.variables).forEach(([key, variable]) => {
          const what = `driver ${driver.property}[${driver.index}] variable ${key}`;
          check(bone.name, what, variable.bone);
          if (variable.type === 'SINGLE_PROP') {
            const source = this.bones.get(variable.bone);
            if (source && !(variable.property in source.properties)) {
              problems.push(`${bone.name}: ${what} references missing property "${variable.property}"`);
            }
          }
        })
      );
      if (bone.bbone) {
        check(bone.name, 'bbone start handle', bone.bbone.handleStart);
        check(bone.name, 'bbone end handle', bone.bbone.handleEnd);
      }
    });
    return problems;
  }

  toJSON(): { bones: RigBone[] } {
    return { bones: this.list().map((bone) => structuredClone(bone)) };
  }
}
