import type { ChainSpec } from './chainDeformation';
import type { ControlNodeRegistry } from './controlNodeRegistry';
import type { MetarigIndex } from './metarig';
import type { RigGenerationConfig } from './rigConfig';
import type { RigGraph } from './rigGraph';
import type { RigLog } from './rigLog';
import { deriveName } from './symmetryNaming';

export type ParentLayerKind = 'offset' | 'propagate' | 'merge-parent';

export interface ParentLayer {
  kind: ParentLayerKind;
  bone: string;
}

/**
 * Extra parent mechanism bones stacked under a claim's control, keyed by
 * claim handle id. Written by the chain builder, read by the composer.
 */
export type ParentLayerTable = Map<number, ParentLayer[]>;

export interface RigBuildContext {
  readonly metarig: MetarigIndex;
  readonly graph: RigGraph;
  readonly registry: ControlNodeRegistry;
  readonly log: RigLog;
  readonly config: RigGenerationConfig;
  readonly chains: ReadonlyMap<string, ChainSpec>;
  readonly parentLayers: ParentLayerTable;
}

export const orgName = (bone: string): string => deriveName(bone, 'org');

/** Length given to generated bones whose source geometry has none. */
export const fallbackBoneLength = (config: Pick<RigGenerationConfig, 'mergeTolerance'>): number =>
  config.mergeTolerance * 100;

/** Bone the generator rooted at `bone` hangs its mechanism from. */
export const rigParentBone = (context: Pick<RigBuildContext, 'metarig' | 'config'>, bone: string): string => {
  const parent = context.metarig.parentOf(bone);
  return parent ? orgName(parent) : context.config.rootBone;
};

export const addParentLayer = (table: ParentLayerTable, handleId: number, layer: ParentLayer): void => {
  const layers = table.get(handleId);
  if (layers) layers.push(layer);
  else table.set(handleId, [layer]);
};

/** Output bone of the topmost layer, or the fallback when none exist. */
export const topParentLayer = (table: ParentLayerTable, handleId: number, fallback: string): string => {
  const layers = table.get(handleId);
  return layers && layers.length > 0 ? layers[layers.length - 1].bone : fallback;
};
