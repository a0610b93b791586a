import { z } from 'zod';
import { RigConfigurationError } from '../errors';
import type { Metarig, MetarigBone, MetarigConstraint, SkinRigSpec } from '../metarig';
import { FALLOFF_DISABLED, FALLOFF_MAX } from '../falloff';
import { vec3 } from '../vectorMath';

const vec3Schema = z
  .tuple([z.number().finite(), z.number().finite(), z.number().finite()])
  .transform(([x, y, z]) => vec3(x, y, z));

const constraintSchema = z.object({
  name: z.string().min(1),
  kind: z.string().min(1),
  subtargets: z.array(z.string()).default([]),
  influence: z.number().min(0).max(1).default(1),
  settings: z.record(z.union([z.number(), z.string(), z.boolean()])).default({}),
});

const metarigBoneSchema = z.object({
  name: z.string().min(1),
  parent: z.string().min(1).nullable().default(null),
  head: vec3Schema,
  tail: vec3Schema,
  roll: z.number().finite().default(0),
  connected: z.boolean().default(false),
  rigType: z.string().min(1).optional(),
  params: z.record(z.unknown()).default({}),
  constraints: z.array(constraintSchema).default([]),
});

export const metarigInputSchema = z.object({
  name: z.string().min(1).default('metarig'),
  bones: z.array(metarigBoneSchema).min(1),
});

const sharpenAngleSchema = z.number().gt(0).max(180);
const falloffExponentSchema = z.number().min(FALLOFF_DISABLED).max(FALLOFF_MAX);

export const basicChainParamsSchema = z.object({
  segments: z.number().int().min(1).optional(),
  connectMirror: z.boolean().default(true),
  connectEnds: z.boolean().default(false),
  priority: z.number().int().default(0),
  controlRotationIndex: z.number().int().min(0).default(0),
  sharpenCorners: z.boolean().default(false),
  sharpenAngle: sharpenAngleSchema.optional(),
  mergeParentRotationScale: z.boolean().default(false),
});

export const stretchyChainParamsSchema = basicChainParamsSchema.extend({
  pivotPos: z.number().int().min(0).default(0),
  falloff: z.tuple([falloffExponentSchema, falloffExponentSchema, falloffExponentSchema]).default([0, 1, 0]),
  falloffSpherical: z.tuple([z.boolean(), z.boolean(), z.boolean()]).default([false, false, false]),
  falloffAlongCurve: z.boolean().default(false),
  propagateTwist: z.boolean().default(true),
  propagateScale: z.boolean().default(false),
  propagateToControls: z.boolean().default(false),
});

export const anchorParamsSchema = z.object({
  makeDeform: z.boolean().default(true),
  hideUnlessMerged: z.boolean().default(false),
  controlRotationIndex: z.number().int().min(0).default(0),
  mergeParentRotationScale: z.boolean().default(false),
});

export const glueParamsSchema = z.object({
  headMode: z.enum(['child', 'mirror', 'reparent']).default('child'),
  relinkConstraints: z.boolean().default(false),
  useTail: z.boolean().default(false),
  tailReparent: z.boolean().default(false),
});

export type BasicChainParams = z.output<typeof basicChainParamsSchema>;
export type StretchyChainParams = z.output<typeof stretchyChainParamsSchema>;
export type AnchorParams = z.output<typeof anchorParamsSchema>;
export type GlueParams = z.output<typeof glueParamsSchema>;
export type MetarigInput = z.input<typeof metarigInputSchema>;

const describeIssue = (error: z.ZodError): string => {
  const issue = error.issues[0];
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
};

const parseParams = <T extends z.ZodTypeAny>(
  schema: T,
  params: Record<string, unknown>,
  bone: string,
  generator: string
): z.output<T> => {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new RigConfigurationError(`Invalid parameters: ${describeIssue(parsed.error)}`, { bone, generator });
  }
  return parsed.data;
};

const parseRigSpec = (
  rigType: string | undefined,
  params: Record<string, unknown>,
  bone: string
): SkinRigSpec | null => {
  switch (rigType) {
    case undefined:
      return null;
    case 'skin.basic_chain':
      return { type: rigType, params: parseParams(basicChainParamsSchema, params, bone, rigType) };
    case 'skin.stretchy_chain':
      return { type: rigType, params: parseParams(stretchyChainParamsSchema, params, bone, rigType) };
    case 'skin.anchor':
      return { type: rigType, params: parseParams(anchorParamsSchema, params, bone, rigType) };
    case 'skin.glue':
      return { type: rigType, params: parseParams(glueParamsSchema, params, bone, rigType) };
    default:
      return { type: 'external', tag: rigType };
  }
};

const assertAcyclic = (bones: Map<string, MetarigBone>): void => {
  bones.forEach((bone) => {
    const seen = new Set<string>([bone.name]);
    let parent = bone.parent;
    while (parent) {
      if (seen.has(parent)) {
        throw new RigConfigurationError('Bone hierarchy contains a cycle', { bone: bone.name });
      }
      seen.add(parent);
      parent = bones.get(parent)?.parent ?? null;
    }
  });
};

const boneNameAt = (input: unknown, index: number): string => {
  if (typeof input !== 'object' || input === null || !('bones' in input) || !Array.isArray(input.bones)) {
    return `#${index}`;
  }
  const entry: unknown = input.bones[index];
  if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
    return entry.name;
  }
  return `#${index}`;
};

/** Validates a raw metarig description into the typed model. */
export const parseMetarig = (input: unknown): Metarig => {
  const parsed = metarigInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const boneIndex = issue.path[0] === 'bones' ? issue.path[1] : undefined;
    const boneName = typeof boneIndex === 'number' ? boneNameAt(input, boneIndex) : undefined;
    throw new RigConfigurationError(`Invalid metarig: ${describeIssue(parsed.error)}`, { bone: boneName });
  }

  const bones = new Map<string, MetarigBone>();
  parsed.data.bones.forEach((raw) => {
    if (bones.has(raw.name)) {
      throw new RigConfigurationError('Duplicate bone name', { bone: raw.name });
    }
    const constraints: MetarigConstraint[] = raw.constraints.map((constraint) => ({ ...constraint }));
    bones.set(raw.name, {
      name: raw.name,
      parent: raw.parent,
      head: raw.head,
      tail: raw.tail,
      roll: raw.roll,
      connected: raw.connected,
      rigType: raw.rigType ?? null,
      rig: parseRigSpec(raw.rigType, raw.params, raw.name),
      constraints,
    });
  });

  bones.forEach((bone) => {
    if (bone.parent !== null && !bones.has(bone.parent)) {
      throw new RigConfigurationError(`Parent "${bone.parent}" does not exist`, { bone: bone.name });
    }
  });

  assertAcyclic(bones);

  return { name: parsed.data.name, bones: Array.from(bones.values()) };
};
