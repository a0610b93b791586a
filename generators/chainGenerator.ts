import type { BasicChainParams, StretchyChainParams } from '../adapters/metarigSchema';
import { buildChainDeformation, type ChainKind, type ChainSpec, type PropagationSettings } from '../chainDeformation';
import type { ControlRole, NodeHandle } from '../controlNodeRegistry';
import { RigConfigurationError } from '../errors';
import type { MetarigIndex } from '../metarig';
import { deriveName } from '../symmetryNaming';
import { addVec, crossVec, dotVec, normalizeVec, quatFromBasis, scaleVec, subVec, vec3, type Quat, type Vec3 } from '../vectorMath';
import {
  chainIdentity,
  controlOrientation,
  controlSize,
  type RegistrationContext,
  type SkinGenerator,
} from './skinGenerator';

interface ChainPoint {
  name: string;
  orgBone: string;
  position: Vec3;
}

/**
 * Rest orientation of a whole chain: Y from the first head to the last tail,
 * X along the normal of the plane the chain bends in.
 */
export const chainOrientation = (metarig: MetarigIndex, orgBones: string[]): Quat => {
  const first = metarig.bone(orgBones[0]);
  const last = metarig.bone(orgBones[orgBones.length - 1]);
  const firstFrame = metarig.frame(first.name);
  const y = normalizeVec(subVec(last.tail, first.head)) ?? firstFrame.y;

  const segments = orgBones.map((bone) => {
    const { head, tail } = metarig.bone(bone);
    return subVec(tail, head);
  });
  const normal = segments
    .slice(1)
    .reduce((acc, segment, i) => addVec(acc, crossVec(segments[i], segment)), vec3());

  const perpendicular = (v: Vec3) => normalizeVec(subVec(v, scaleVec(y, dotVec(v, y))));
  const x = perpendicular(normal) ?? perpendicular(firstFrame.x) ?? firstFrame.x;
  return quatFromBasis(x, y, crossVec(x, y));
};

/** Base bone plus connected children, up to the next bone with its own rig type. */
export const chainBones = (metarig: MetarigIndex, base: string): string[] => {
  const chain = metarig.connectedChain(base);
  const stop = chain.findIndex((bone, i) => i > 0 && metarig.bone(bone).rigType !== null);
  return stop < 0 ? chain : chain.slice(0, stop);
};

/** Heads of every org bone, then the tail of the last one. */
export const chainPoints = (metarig: MetarigIndex, orgBones: string[]): ChainPoint[] => {
  const points = orgBones.map((bone) => ({ name: bone, orgBone: bone, position: metarig.bone(bone).head }));
  const last = orgBones[orgBones.length - 1];
  points.push({ name: deriveName(last, 'ctrl', '_end'), orgBone: last, position: metarig.bone(last).tail });
  return points;
};

interface ChainVariant<P extends BasicChainParams> {
  kind: ChainKind;
  validate: (orgBones: string[], params: P) => void;
  nodeRole: (index: number, count: number, params: P) => ControlRole;
  propagation: (params: P) => PropagationSettings | null;
}

const createChainGenerator = <P extends BasicChainParams>(
  base: string,
  params: P,
  variant: ChainVariant<P>
): SkinGenerator => ({
  kind: variant.kind,
  base,

  registerNodes: ({ metarig, registry, config }: RegistrationContext): ChainSpec => {
    const orgBones = chainBones(metarig, base);
    variant.validate(orgBones, params);

    const identity = chainIdentity(metarig, base, variant.kind, params.priority);
    const orientation = controlOrientation(
      metarig,
      base,
      variant.kind,
      params.controlRotationIndex,
      chainOrientation(metarig, orgBones)
    );
    const averageLength = orgBones.reduce((sum, bone) => sum + metarig.length(bone), 0) / orgBones.length;
    const size = controlSize(averageLength / 3, config);
    const points = chainPoints(metarig, orgBones);

    const handles: NodeHandle[] = points.map((point, index) =>
      registry.register({
        chain: identity,
        index,
        name: point.name,
        orgBone: point.orgBone,
        position: point.position,
        orientation,
        size,
        role: variant.nodeRole(index, points.length - 1, params),
        mergeScope: metarig.rootOf(base),
        mergeParentTransform: params.mergeParentRotationScale,
      })
    );

    return {
      id: base,
      kind: variant.kind,
      orgBones,
      handles,
      segments: params.segments ?? config.defaultSegments,
      connectMirror: params.connectMirror,
      connectEnds: params.connectEnds,
      sharpen: {
        enabled: params.sharpenCorners,
        angle: params.sharpenAngle ?? config.defaultSharpenAngle,
      },
      propagation: variant.propagation(params),
    };
  },

  buildChain: (context, options) => {
    const spec = context.chains.get(base);
    if (!spec) {
      throw new RigConfigurationError('Chain was not registered before the build phase', {
        bone: base,
        generator: variant.kind,
      });
    }
    return buildChainDeformation(context, spec, options);
  },

  finalize: () => undefined,
});

export const createBasicChainGenerator = (base: string, params: BasicChainParams): SkinGenerator =>
  createChainGenerator(base, params, {
    kind: 'skin.basic_chain',
    validate: () => undefined,
    nodeRole: (index, count) => (index === 0 || index === count ? 'end' : 'middle'),
    propagation: () => null,
  });

export const createStretchyChainGenerator = (base: string, params: StretchyChainParams): SkinGenerator =>
  createChainGenerator(base, params, {
    kind: 'skin.stretchy_chain',
    validate: (orgBones, { pivotPos }) => {
      if (orgBones.length < 2) {
        throw new RigConfigurationError('Stretchy chain needs at least 2 connected bones', {
          bone: base,
          generator: 'skin.stretchy_chain',
        });
      }
      if (pivotPos >= orgBones.length) {
        throw new RigConfigurationError(`Pivot position ${pivotPos} must be below the bone count ${orgBones.length}`, {
          bone: base,
          generator: 'skin.stretchy_chain',
        });
      }
    },
    nodeRole: (index, count, { pivotPos }) => {
      if (index === 0 || index === count) return 'end';
      return index === pivotPos ? 'middle' : 'tweak';
    },
    propagation: (p) => ({
      pivotPos: p.pivotPos,
      falloff: [
        { exponent: p.falloff[0], spherical: p.falloffSpherical[0] },
        { exponent: p.falloff[1], spherical: p.falloffSpherical[1] },
        { exponent: p.falloff[2], spherical: p.falloffSpherical[2] },
      ],
      alongCurve: p.falloffAlongCurve,
      twist: p.propagateTwist,
      scale: p.propagateScale,
      toControls: p.propagateToControls,
    }),
  });
