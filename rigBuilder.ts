import { parseMetarig } from './adapters/metarigSchema';
import type { ChainBuildOptions, ChainBuildResult, ChainSpec } from './chainDeformation';
import { ControlNodeRegistry, type ControlNode } from './controlNodeRegistry';
import { RigConfigurationError, RigIntegrityError } from './errors';
import { createAnchorGenerator } from './generators/anchor';
import { createBasicChainGenerator, createStretchyChainGenerator } from './generators/chainGenerator';
import { createGlueGenerator } from './generators/glue';
import type { SkinGenerator } from './generators/skinGenerator';
import { MetarigIndex, type MetarigBone } from './metarig';
import { composeNodeTransform, type ComposedTransform } from './parentAutomation';
import { resolveRigConfig, type RigGenerationConfig, type RigGenerationConfigInput } from './rigConfig';
import { fallbackBoneLength, orgName, type RigBuildContext } from './rigContext';
import { RigGraph } from './rigGraph';
import { RigLog, type RigLogEntry } from './rigLog';
import { EPSILON, addVec, scaleVec, vec3 } from './vectorMath';

export interface RigBuildOptions extends ChainBuildOptions {
  /** Collects entries instead of a fresh log; useful to keep history across rebuilds. */
  log?: RigLog;
}

export interface RigBuildResult {
  graph: RigGraph;
  nodes: readonly ControlNode[];
  transforms: ComposedTransform[];
  chains: ChainBuildResult[];
  warnings: RigLogEntry[];
  log: RigLog;
}

export const createSkinGenerator = (bone: MetarigBone): SkinGenerator | null => {
  const { rig } = bone;
  if (!rig) return null;
  switch (rig.type) {
    case 'skin.basic_chain':
      return createBasicChainGenerator(bone.name, rig.params);
    case 'skin.stretchy_chain':
      return createStretchyChainGenerator(bone.name, rig.params);
    case 'skin.anchor':
      return createAnchorGenerator(bone.name, rig.params);
    case 'skin.glue':
      return createGlueGenerator(bone.name, rig.params);
    case 'external':
      return null;
  }
};

const copyOrgBones = (metarig: MetarigIndex, graph: RigGraph, config: RigGenerationConfig, log: RigLog): void => {
  const mapTarget = (target: string) => (metarig.has(target) ? orgName(target) : target);

  metarig.metarig.bones.forEach((bone) => {
    let { tail } = bone;
    if (metarig.length(bone.name) < EPSILON) {
      // Frame Y falls back to +Y for a bone without a direction
      tail = addVec(bone.head, scaleVec(metarig.frame(bone.name).y, fallbackBoneLength(config)));
      log.warn('zero-length-bone', 'Bone has zero length; using a default direction', { bone: bone.name });
    }
    graph.addBone({ name: orgName(bone.name), role: 'org', head: bone.head, tail, roll: bone.roll });
  });
  metarig.metarig.bones.forEach((bone) => {
    const name = orgName(bone.name);
    graph.setParent(name, bone.parent ? orgName(bone.parent) : config.rootBone, { useConnect: bone.connected });
    bone.constraints.forEach((constraint) =>
      graph.addConstraint(name, constraint.kind, {
        name: constraint.name,
        targets: constraint.subtargets.map(mapTarget),
        influence: constraint.influence,
        settings: constraint.settings,
      })
    );
  });
};

/**
 * Generates the full rig from a metarig description. Nothing is returned
 * unless every phase succeeds.
 */
export const generateRig = (
  input: unknown,
  configInput: RigGenerationConfigInput = {},
  options: RigBuildOptions = {}
): RigBuildResult => {
  const config = resolveRigConfig(configInput);
  const metarig = new MetarigIndex(parseMetarig(input));
  const log = options.log ?? new RigLog({ echo: config.echoLog });

  if (metarig.has(config.rootBone)) {
    throw new RigConfigurationError(`Metarig bone collides with the generated root "${config.rootBone}"`, {
      bone: config.rootBone,
    });
  }

  const graph = new RigGraph();
  graph.addBone({ name: config.rootBone, role: 'root', head: vec3(), tail: vec3(0, 1, 0) });
  copyOrgBones(metarig, graph, config, log);

  const generators: SkinGenerator[] = [];
  [...metarig.metarig.bones]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .forEach((bone) => {
      const generator = createSkinGenerator(bone);
      if (generator) {
        generators.push(generator);
      } else if (bone.rig?.type === 'external') {
        log.info(`Rig type "${bone.rig.tag}" is handled outside the skin system`, {
          code: 'unhandled-rig-type',
          bone: bone.name,
          generator: bone.rig.tag,
        });
      }
    });

  // Phase 1: collect every control point, then resolve owners
  const registry = new ControlNodeRegistry(config.mergeTolerance);
  const chains = new Map<string, ChainSpec>();
  generators.forEach((generator) => {
    const chain = generator.registerNodes({ metarig, registry, config, log });
    if (chain) chains.set(chain.id, chain);
  });
  const nodes = registry.freeze();

  // Phase 2: mechanisms, controls, then query-only generators
  const context: RigBuildContext = { metarig, graph, registry, log, config, chains, parentLayers: new Map() };
  const chainResults = generators
    .map((generator) => generator.buildChain(context, { falloff: options.falloff }))
    .filter((result): result is ChainBuildResult => result !== null);

  const composed = new Map<number, ComposedTransform>();
  nodes.forEach((node) => composed.set(node.id, composeNodeTransform(node, context)));

  generators.forEach((generator) => generator.finalize(context, composed));

  const problems = graph.validate();
  if (problems.length > 0) {
    throw new RigIntegrityError(problems);
  }

  log.info(`Generated ${graph.list().length} bones from ${generators.length} skin rigs and ${nodes.length} control nodes`);

  return {
    graph,
    nodes,
    transforms: Array.from(composed.values()),
    chains: chainResults,
    warnings: log.getEntries('warn'),
    log,
  };
};
