import type { ChainSpec } from './chainDeformation';
import type { ControlNode, NodeClaim } from './controlNodeRegistry';
import { addParentLayer, rigParentBone, topParentLayer, type RigBuildContext } from './rigContext';
import type { RigGraph } from './rigGraph';
import { deriveName } from './symmetryNaming';
import {
  IDENTITY_QUAT,
  addVec,
  canonicalQuat,
  distanceVec,
  normalizeQuat,
  rotateVec,
  scaleVec,
  vec3,
  type Quat,
  type Vec3,
} from './vectorMath';

export interface ComposedTransform {
  nodeId: number;
  control: string;
  position: Vec3;
  rotation: Quat;
  size: number;
  /** Distinct parent mechanism outputs of the contributing claims, sorted. */
  parents: string[];
  /** Bone the control ends up parented to. */
  parentBone: string;
  averaged: boolean;
  mixParent: string | null;
  mergeParent: string | null;
  hidden: boolean;
}

/** Order-independent rotation average: hemisphere-aligned sum, then normalize. */
export const averageRotation = (rotations: readonly Quat[]): Quat => {
  if (rotations.length === 0) return { ...IDENTITY_QUAT };
  const sum = rotations.map(canonicalQuat).reduce(
    (acc, q) => ({ x: acc.x + q.x, y: acc.y + q.y, z: acc.z + q.z, w: acc.w + q.w }),
    { x: 0, y: 0, z: 0, w: 0 }
  );
  if (Math.hypot(sum.x, sum.y, sum.z, sum.w) < 1e-9) {
    return canonicalQuat(rotations[0]);
  }
  return canonicalQuat(normalizeQuat(sum));
};

const contributors = (node: ControlNode): readonly NodeClaim[] => node.symmetryGroup ?? [node.owner];

const claimParent = (context: RigBuildContext, claim: NodeClaim): string =>
  topParentLayer(context.parentLayers, claim.handle.id, rigParentBone(context, claim.chain.id));

/** Skin chain that drives the metarig parent of the owning generator. */
const findParentChain = (context: RigBuildContext, claim: NodeClaim): ChainSpec | null => {
  const parent = context.metarig.parentOf(claim.chain.id);
  if (!parent) return null;
  for (const chain of context.chains.values()) {
    if (chain.orgBones.includes(parent)) return chain;
  }
  return null;
};

/** True when `bone` already follows `target` through parents, constraints or drivers. */
const followsBone = (graph: RigGraph, bone: string, target: string, seen = new Set<string>()): boolean => {
  if (bone === target) return true;
  if (seen.has(bone) || !graph.has(bone)) return false;
  seen.add(bone);
  const { parent, constraints, drivers } = graph.get(bone);
  const inputs = [
    ...(parent ? [parent] : []),
    ...constraints.flatMap((constraint) => constraint.targets.map((t) => t.bone)),
    ...drivers.flatMap((driver) => Object.values(driver.variables).map((variable) => variable.bone)),
  ];
  return inputs.some((input) => followsBone(graph, input, target, seen));
};

/** Bones a node's control hangs from, before or after it is composed. */
const controlInputs = (context: RigBuildContext, node: ControlNode): string[] =>
  context.graph.has(node.name) ? [node.name] : contributors(node).map((claim) => claimParent(context, claim));

/**
 * Closest control of the chain that neither is the node nor already follows
 * it, so inheriting from it cannot close a dependency loop.
 */
const nearestIndependentNode = (context: RigBuildContext, chain: ChainSpec, node: ControlNode): ControlNode | null => {
  const seen = new Set<number>([node.id]);
  const candidates = chain.handles
    .map((handle) => context.registry.node(handle))
    .filter((other) => {
      if (seen.has(other.id)) return false;
      seen.add(other.id);
      return !controlInputs(context, other).some((input) => followsBone(context.graph, input, node.name));
    });
  if (candidates.length === 0) return null;
  return candidates.reduce((best, candidate) =>
    distanceVec(candidate.position, node.position) < distanceVec(best.position, node.position) ? candidate : best
  );
};

/** Parent chain controls to inherit rotation and scale from, one per opted-in group member. */
const mergeSources = (context: RigBuildContext, node: ControlNode, members: readonly NodeClaim[]): string[] => {
  const sources = new Set<string>();
  members.forEach((claim) => {
    if (!claim.mergeParentTransform) return;
    const chain = findParentChain(context, claim);
    const source = chain ? nearestIndependentNode(context, chain, node) : null;
    if (source) sources.add(source.name);
  });
  return Array.from(sources).sort();
};

/** Exposes a slider on the control and drives one constraint channel from it. */
const driveFromSlider = (
  context: RigBuildContext,
  control: string,
  slider: string,
  description: string,
  value: number,
  targets: Array<{ bone: string; property: string; index: number }>
): void => {
  const { graph } = context;
  graph.defineProperty(control, slider, { value, description });
  targets.forEach(({ bone, property, index }) =>
    graph.addDriver(bone, {
      property,
      index,
      expression: 'var',
      variables: { var: { type: 'SINGLE_PROP', bone: control, property: slider } },
    })
  );
};

const isHiddenAnchor = (context: RigBuildContext, node: ControlNode): boolean => {
  const { owner } = node;
  if (owner.chain.kind !== 'skin.anchor' || node.claims.length > 1) return false;
  const { rig } = context.metarig.bone(owner.chain.id);
  return rig?.type === 'skin.anchor' && rig.params.hideUnlessMerged;
};

/**
 * Creates the control bone of a frozen node: averaged orientation and size
 * over the symmetry group, parented to the owner automation (mixed when the
 * group disagrees) plus the optional parent chain rotation and scale.
 */
export const composeNodeTransform = (node: ControlNode, context: RigBuildContext): ComposedTransform => {
  const { graph, config } = context;
  const members = contributors(node);
  const rotation = averageRotation(members.map((claim) => claim.orientation));
  const size = members.reduce((sum, claim) => sum + claim.size, 0) / members.length;
  const parents = Array.from(new Set(members.map((claim) => claimParent(context, claim)))).sort();

  let parentBone = parents[0];
  let mixParent: string | null = null;
  if (parents.length > 1) {
    mixParent = deriveName(node.name, 'mch', '_mix_parent');
    graph.addBone({
      name: mixParent,
      role: 'mch',
      head: node.position,
      tail: addVec(node.position, rotateVec(vec3(0, size / 2, 0), rotation)),
      rotation,
    });
    graph.setParent(mixParent, config.rootBone);
    graph.addConstraint(mixParent, 'ARMATURE', {
      targets: parents.map((bone) => ({ bone, weight: 1 / parents.length })),
    });
    parentBone = mixParent;
  }

  let mergeParent: string | null = null;
  const sources = mergeSources(context, node, members);
  if (sources.length > 0) {
    const restTail = addVec(node.position, rotateVec(vec3(0, size / 2, 0), rotation));
    let source = sources[0];
    if (sources.length > 1) {
      source = deriveName(node.name, 'mch', '_merge_source');
      graph.addBone({ name: source, role: 'mch', head: node.position, tail: restTail, rotation });
      graph.setParent(source, config.rootBone);
      graph.addConstraint(source, 'ARMATURE', {
        targets: sources.map((bone) => ({ bone, weight: 1 / sources.length })),
      });
    }

    mergeParent = deriveName(node.name, 'mch', '_merge_parent');
    graph.addBone({ name: mergeParent, role: 'mch', head: node.position, tail: restTail, rotation });
    graph.setParent(mergeParent, parentBone, { inheritScale: 'AVERAGE' });
    graph.addConstraint(mergeParent, 'COPY_ROTATION', {
      targets: [source],
      settings: { mix_mode: 'BEFORE', target_space: 'LOCAL', owner_space: 'LOCAL' },
    });
    graph.addConstraint(mergeParent, 'COPY_SCALE', {
      targets: [source],
      settings: { use_offset: true, target_space: 'LOCAL', owner_space: 'LOCAL' },
    });
    addParentLayer(context.parentLayers, node.owner.handle.id, { kind: 'merge-parent', bone: mergeParent });
    parentBone = mergeParent;
  }

  const hidden = isHiddenAnchor(context, node);
  const control = graph.addBone({
    name: node.name,
    role: 'ctrl',
    head: node.position,
    tail: addVec(node.position, scaleVec(rotateVec(vec3(0, 1, 0), rotation), size)),
    rotation,
  });
  control.hidden = hidden;
  graph.setParent(node.name, parentBone, { inheritScale: 'AVERAGE' });

  if (mixParent) {
    const mixBone = mixParent;
    parents.forEach((parent, i) =>
      driveFromSlider(context, node.name, `parent_weight_${i}`, `Follow ${parent}`, 1 / parents.length, [
        { bone: mixBone, property: 'constraints.armature.targets.weight', index: i },
      ])
    );
  }
  if (mergeParent) {
    const mergeBone = mergeParent;
    driveFromSlider(context, node.name, 'merge_parent', 'Follow the parent chain rotation and scale', 1, [
      { bone: mergeBone, property: 'constraints.copy_rotation.influence', index: 0 },
      { bone: mergeBone, property: 'constraints.copy_scale.influence', index: 0 },
    ]);
  }

  return {
    nodeId: node.id,
    control: node.name,
    position: node.position,
    rotation,
    size,
    parents,
    parentBone,
    averaged: members.length > 1,
    mixParent,
    mergeParent,
    hidden,
  };
};
