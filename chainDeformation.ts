import type { ControlNode, NodeClaim, NodeHandle } from './controlNodeRegistry';
import { RigConfigurationError } from './errors';
import { falloffWeight, type FalloffFn, type FalloffSpec } from './falloff';
import { findMirrorClaim } from './ownershipResolver';
import {
  addParentLayer,
  fallbackBoneLength,
  orgName,
  rigParentBone,
  topParentLayer,
  type RigBuildContext,
} from './rigContext';
import type { DriverVariable } from './rigGraph';
import { deriveName } from './symmetryNaming';
import { clamp01, formatFactor, r2d } from './utils';
import { addVec, angleBetween, distanceVec, dotVec, normalizeVec, scaleVec, subVec, vec3, type Vec3 } from './vectorMath';

export type ChainKind = 'skin.basic_chain' | 'skin.stretchy_chain';
export type ChainEndSide = 'start' | 'end';
export type ConnectionMode = 'mirror' | 'ends';

export interface PropagationSettings {
  /** Index of the middle driver node, 0 when absent. */
  pivotPos: number;
  /** Start, middle and end. */
  falloff: [FalloffSpec, FalloffSpec, FalloffSpec];
  alongCurve: boolean;
  twist: boolean;
  scale: boolean;
  toControls: boolean;
}

export interface ChainSpec {
  id: string;
  kind: ChainKind;
  /** Metarig bone names, base first. */
  orgBones: string[];
  /** One per node: the head of every org bone, then the tail of the last. */
  handles: NodeHandle[];
  segments: number;
  connectMirror: boolean;
  connectEnds: boolean;
  sharpen: { enabled: boolean; angle: number };
  propagation: PropagationSettings | null;
}

export interface ChainConnection {
  side: ChainEndSide;
  mode: ConnectionMode;
  partnerChain: string;
  partnerIndex: number;
  /** Node next to the shared one along the partner chain. */
  neighbor: ControlNode;
}

export interface NodeInfluence {
  source: 'start' | 'middle' | 'end';
  node: string;
  weight: number;
}

export interface NodePropagation {
  index: number;
  factor: number;
  influences: NodeInfluence[];
  twist: { from: number; to: number; factor: number } | null;
}

export interface ChainBuildResult {
  chainId: string;
  orgBones: string[];
  deformBones: string[];
  handleBones: string[];
  connections: ChainConnection[];
  /** B-Bone ease at every node; 1 where no sharpening applies. */
  jointEase: number[];
  propagation: NodePropagation[];
}

export interface ChainBuildOptions {
  falloff?: FalloffFn;
}

export interface CornerEase {
  /** Degrees between the two incident segments; 180 is a straight line. */
  angle: number;
  ease: number;
}

const MIN_SEGMENT = 1e-5;

/**
 * Ease of the B-Bone handles meeting at a joint: 1 at or above the
 * threshold, falling linearly to 0 as the corner folds shut.
 */
export const computeCornerEase = (prev: Vec3, joint: Vec3, next: Vec3, thresholdDeg: number): CornerEase => {
  const incoming = subVec(prev, joint);
  const outgoing = subVec(next, joint);
  if (!normalizeVec(incoming, MIN_SEGMENT) || !normalizeVec(outgoing, MIN_SEGMENT)) {
    return { angle: 180, ease: 1 };
  }
  const angle = r2d(angleBetween(incoming, outgoing));
  return { angle, ease: angle >= thresholdDeg ? 1 : clamp01(angle / thresholdDeg) };
};

export const computeChainLengths = (lengths: number[]): number[] => {
  const result = [0];
  lengths.forEach((length, i) => result.push(result[i] + length));
  return result;
};

const isChainEnd = (claim: NodeClaim, spec: ChainSpec): boolean =>
  claim.index === 0 || claim.index === spec.handles.length - 1;

const neighborIndex = (claim: NodeClaim, spec: ChainSpec): number =>
  claim.index === 0 ? 1 : spec.handles.length - 2;

/**
 * Partner chain end that continues this chain through a shared node, when
 * both sides opted into the same kind of connection.
 */
export const findChainConnection = (
  context: RigBuildContext,
  spec: ChainSpec,
  side: ChainEndSide
): ChainConnection | null => {
  const handle = side === 'start' ? spec.handles[0] : spec.handles[spec.handles.length - 1];
  const claim = context.registry.claim(handle);
  const node = context.registry.node(handle);

  const linkTo = (partner: NodeClaim, mode: ConnectionMode): ChainConnection | null => {
    const partnerSpec = context.chains.get(partner.chain.id);
    if (!partnerSpec) return null;
    const index = neighborIndex(partner, partnerSpec);
    return {
      side,
      mode,
      partnerChain: partnerSpec.id,
      partnerIndex: partner.index,
      neighbor: context.registry.node(partnerSpec.handles[index]),
    };
  };

  if (spec.connectMirror) {
    const mirror = findMirrorClaim(claim, node.claims);
    const mirrorSpec = mirror ? context.chains.get(mirror.chain.id) : undefined;
    if (mirror && mirrorSpec && mirrorSpec.connectMirror && isChainEnd(mirror, mirrorSpec)) {
      return linkTo(mirror, 'mirror');
    }
  }

  if (spec.connectEnds) {
    const starts: NodeClaim[] = [];
    const ends: NodeClaim[] = [];
    node.claims.forEach((candidate) => {
      const candidateSpec = context.chains.get(candidate.chain.id);
      if (!candidateSpec || !candidateSpec.connectEnds || !isChainEnd(candidate, candidateSpec)) return;
      if (candidate.index === 0) starts.push(candidate);
      else ends.push(candidate);
    });

    if (starts.length === 1 && ends.length === 1 && (starts[0] === claim || ends[0] === claim)) {
      return linkTo(starts[0] === claim ? ends[0] : starts[0], 'ends');
    }
  }

  return null;
};

const twistVariable = (bone: string): DriverVariable => ({
  type: 'TRANSFORMS',
  bone,
  channel: 'ROT_Y',
  space: 'LOCAL',
  rotationMode: 'SWING_TWIST_Y',
});

interface ChainGeometry {
  nodes: ControlNode[];
  claims: NodeClaim[];
  chainLengths: number[];
  base: Vec3;
  axis: Vec3 | null;
  axisLength: number;
}

const projectionFactor = (geometry: ChainGeometry, index: number, alongCurve: boolean): number => {
  const total = geometry.chainLengths[geometry.chainLengths.length - 1];
  if (alongCurve || !geometry.axis) {
    return total > 0 ? geometry.chainLengths[index] / total : 0;
  }
  const offset = subVec(geometry.nodes[index].position, geometry.base);
  return clamp01(dotVec(offset, geometry.axis) / geometry.axisLength);
};

const safeRatio = (a: number, b: number): number => (b > MIN_SEGMENT ? a / b : 1);

/** Builds the org, deform and handle mechanism of one chain. */
export const buildChainDeformation = (
  context: RigBuildContext,
  spec: ChainSpec,
  options: ChainBuildOptions = {}
): ChainBuildResult => {
  const { graph, metarig, registry, log } = context;
  const falloff = options.falloff ?? falloffWeight;

  if (spec.handles.length < 2 || spec.orgBones.length !== spec.handles.length - 1) {
    throw new RigConfigurationError(`Chain needs at least 2 control nodes, got ${spec.handles.length}`, {
      bone: spec.id,
      generator: spec.kind,
    });
  }

  const parentBone = rigParentBone(context, spec.id);
  const nodes = spec.handles.map((handle) => registry.node(handle));
  const claims = spec.handles.map((handle) => registry.claim(handle));
  const count = nodes.length - 1;
  const boneLengths = spec.orgBones.map((bone) => metarig.length(bone));
  const averageLength = boneLengths.reduce((sum, length) => sum + length, 0) / boneLengths.length;
  const handleLength = averageLength > MIN_SEGMENT ? averageLength * 0.75 : fallbackBoneLength(context.config);

  boneLengths.forEach((length, i) => {
    if (length < MIN_SEGMENT) {
      log.warn('degenerate-segment', 'Chain segment has zero length; its ends share one control', {
        bone: spec.orgBones[i],
        generator: spec.kind,
        node: nodes[i].name,
      });
    }
  });

  const firstBone = metarig.bone(spec.orgBones[0]);
  const lastBone = metarig.bone(spec.orgBones[count - 1]);
  const axisVector = subVec(lastBone.tail, firstBone.head);
  const geometry: ChainGeometry = {
    nodes,
    claims,
    chainLengths: computeChainLengths(boneLengths),
    base: firstBone.head,
    axis: normalizeVec(axisVector, MIN_SEGMENT),
    axisLength: distanceVec(lastBone.tail, firstBone.head),
  };

  // ORG chain stretches between the controls
  const orgBones = spec.orgBones.map(orgName);
  graph.setParent(orgBones[0], parentBone, { inheritScale: 'AVERAGE' });
  graph.parentChain(orgBones, { inheritScale: 'AVERAGE', useConnect: true });
  orgBones.forEach((org, i) => {
    if (i === 0) {
      graph.addConstraint(org, 'COPY_LOCATION', { targets: [nodes[0].name] });
    }
    graph.addConstraint(org, 'STRETCH_TO', {
      targets: [nodes[i + 1].name],
      settings: { keep_axis: 'SWING_Y' },
    });
  });

  // Deform chain
  const deformBones = spec.orgBones.map((bone) => {
    const name = deriveName(bone, 'def');
    graph.copyBone(orgName(bone), name, 'def');
    graph.setBBone(name, { segments: spec.segments });
    return name;
  });
  graph.setParent(deformBones[0], parentBone, { inheritScale: 'AVERAGE' });
  graph.parentChain(deformBones, { inheritScale: 'AVERAGE', useConnect: true });
  deformBones.forEach((def, i) => graph.addConstraint(def, 'COPY_TRANSFORMS', { targets: [orgBones[i]] }));

  const result: ChainBuildResult = {
    chainId: spec.id,
    orgBones,
    deformBones,
    handleBones: [],
    connections: [],
    jointEase: nodes.map(() => 1),
    propagation: [],
  };

  if (spec.segments <= 1) {
    return result;
  }

  // Connected ends borrow the partner's neighbor so both sides share one tangent
  const startLink = findChainConnection(context, spec, 'start');
  const endLink = findChainConnection(context, spec, 'end');
  result.connections = [startLink, endLink].filter((link): link is ChainConnection => link !== null);
  const linked: Array<ControlNode | null> = [startLink?.neighbor ?? null, ...nodes, endLink?.neighbor ?? null];

  const handleBones = nodes.map((node, i) => {
    const claim = claims[i];
    const name = deriveName(claim.name, 'mch', '_handle');
    const hstart = linked[i] ?? node;
    const hend = linked[i + 2] ?? node;

    let direction = normalizeVec(subVec(hend.position, hstart.position), MIN_SEGMENT);
    if (!direction) {
      const fallback = metarig.frame(spec.orgBones[Math.min(i, count - 1)]).y;
      log.warn('degenerate-direction', 'Handle direction is undefined; using the bone axis', {
        bone: spec.orgBones[Math.min(i, count - 1)],
        generator: spec.kind,
        node: node.name,
      });
      direction = fallback;
    }

    graph.addBone({
      name,
      role: 'mch',
      head: node.position,
      tail: addVec(node.position, scaleVec(direction, handleLength)),
      roll: metarig.bone(spec.orgBones[Math.min(i, count - 1)]).roll,
    });
    graph.setParent(name, parentBone, { inheritScale: 'AVERAGE' });

    graph.addConstraint(name, 'COPY_LOCATION', { name: 'locate_prev', targets: [hstart.name] });
    graph.addConstraint(name, 'DAMPED_TRACK', { name: 'track_next', targets: [hend.name] });
    graph.addConstraint(name, 'COPY_TRANSFORMS', {
      name: 'copy_user',
      targets: [node.name],
      settings: { target_space: 'OWNER_LOCAL', owner_space: 'LOCAL', mix_mode: 'BEFORE_FULL' },
    });
    graph.addConstraint(name, 'LIMIT_ROTATION', { name: 'remove_shear' });
    return name;
  });
  result.handleBones = handleBones;

  deformBones.forEach((def, i) => {
    graph.setBBone(def, {
      segments: spec.segments,
      handleTypeStart: 'TANGENT',
      handleStart: handleBones[i],
      handleTypeEnd: 'TANGENT',
      handleEnd: handleBones[i + 1],
    });
  });

  if (spec.sharpen.enabled) {
    nodes.forEach((node, i) => {
      const prev = linked[i];
      const next = linked[i + 2];
      if (!prev || !next) return;
      const { ease } = computeCornerEase(prev.position, node.position, next.position, spec.sharpen.angle);
      result.jointEase[i] = ease;
      if (i > 0) graph.setBBone(deformBones[i - 1], { segments: spec.segments, easeOut: ease });
      if (i < count) graph.setBBone(deformBones[i], { segments: spec.segments, easeIn: ease });
    });
  }

  if (spec.propagation) {
    result.propagation = buildPropagation(context, spec, spec.propagation, geometry, handleBones, falloff);
  }

  return result;
};

const addTwistAndScale = (
  context: RigBuildContext,
  bone: string,
  handles: string[],
  twist: { from: number; to: number; factor: number },
  settings: PropagationSettings
): void => {
  const { graph } = context;
  if (settings.twist) {
    graph.get(bone).rotationMode = 'YXZ';
    graph.addDriver(bone, {
      property: 'rotation_euler',
      index: 1,
      expression: `lerp(y1,y2,${formatFactor(clamp01(twist.factor))})`,
      variables: {
        y1: twistVariable(handles[twist.from]),
        y2: twistVariable(handles[twist.to]),
      },
    });
  }
  if (settings.scale) {
    const scaleSettings = { use_x: true, use_y: false, use_z: true, use_offset: true, space: 'LOCAL' };
    graph.addConstraint(bone, 'COPY_SCALE', {
      name: 'propagate_scale_from',
      targets: [handles[twist.from]],
      settings: { ...scaleSettings, power: clamp01(1 - twist.factor) },
    });
    graph.addConstraint(bone, 'COPY_SCALE', {
      name: 'propagate_scale_to',
      targets: [handles[twist.to]],
      settings: { ...scaleSettings, power: clamp01(twist.factor) },
    });
  }
};

const buildPropagation = (
  context: RigBuildContext,
  spec: ChainSpec,
  settings: PropagationSettings,
  geometry: ChainGeometry,
  handles: string[],
  falloff: FalloffFn
): NodePropagation[] => {
  const { graph, log, parentLayers } = context;
  const { nodes, claims, chainLengths } = geometry;
  const count = nodes.length - 1;
  const pivot = settings.pivotPos;
  const parentBone = rigParentBone(context, spec.id);

  if (!settings.alongCurve && !geometry.axis) {
    log.warn('degenerate-chain', 'Chain ends coincide; measuring falloff along the chain instead', {
      bone: spec.id,
      generator: spec.kind,
    });
  }

  const middleFactor = pivot ? projectionFactor(geometry, pivot, settings.alongCurve) : 0;
  const lenEnd = chainLengths[count];
  const lenPivot = pivot ? chainLengths[pivot] : 0;
  const result: NodePropagation[] = [];

  for (let i = 1; i < count; i += 1) {
    const node = nodes[i];
    const claim = claims[i];
    const factor = projectionFactor(geometry, i, settings.alongCurve);
    const influences: NodeInfluence[] = [];

    const addInfluence = (source: NodeInfluence['source'], t: number, curve: FalloffSpec, driver: ControlNode) => {
      const weight = falloff(t, curve.exponent, curve.spherical);
      if (weight !== null) influences.push({ source, node: driver.name, weight });
    };

    addInfluence('start', factor, settings.falloff[0], nodes[0]);
    addInfluence('end', 1 - factor, settings.falloff[2], nodes[count]);
    if (pivot && i !== pivot) {
      const proximity = i < pivot ? safeRatio(factor, middleFactor) : safeRatio(1 - factor, 1 - middleFactor);
      addInfluence('middle', 1 - clamp01(proximity), settings.falloff[1], nodes[pivot]);
    }

    if (influences.length > 0) {
      const offsetBone = deriveName(claim.name, 'mch', '_offset');
      graph.addBone({
        name: offsetBone,
        role: 'mch',
        head: node.position,
        tail: addVec(node.position, vec3(0, claim.size / 2, 0)),
      });
      graph.setParent(offsetBone, topParentLayer(parentLayers, claim.handle.id, parentBone), { inheritScale: 'AVERAGE' });
      influences.forEach((influence) => {
        graph.addConstraint(offsetBone, 'COPY_LOCATION', {
          name: `falloff_${influence.source}`,
          targets: [influence.node],
          influence: influence.weight,
          settings: { use_offset: true, target_space: 'LOCAL', owner_space: 'LOCAL' },
        });
      });
      addParentLayer(parentLayers, claim.handle.id, { kind: 'offset', bone: offsetBone });
    }

    let twist: NodePropagation['twist'] = null;
    if (i !== pivot) {
      const len = chainLengths[i];
      if (pivot && i < pivot) {
        twist = { from: 0, to: pivot, factor: safeRatio(len, lenPivot) };
      } else if (pivot) {
        twist = { from: pivot, to: count, factor: safeRatio(len - lenPivot, lenEnd - lenPivot) };
      } else {
        twist = { from: 0, to: count, factor: safeRatio(len, lenEnd) };
      }

      addTwistAndScale(context, handles[i], handles, twist, settings);

      if (settings.toControls && (settings.twist || settings.scale)) {
        const propagateBone = deriveName(claim.name, 'mch', '_propagate');
        const layerParent = topParentLayer(parentLayers, claim.handle.id, parentBone);
        graph.copyBone(handles[i], propagateBone, 'mch');
        graph.setParent(propagateBone, layerParent, { inheritScale: 'AVERAGE' });
        addTwistAndScale(context, propagateBone, handles, twist, settings);
        addParentLayer(parentLayers, claim.handle.id, { kind: 'propagate', bone: propagateBone });
      }
    }

    result.push({ index: i, factor, influences, twist });
  }

  return result;
};
