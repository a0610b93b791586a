import type { ChainBuildOptions, ChainBuildResult, ChainSpec } from '../chainDeformation';
import type { ChainIdentity, ControlNodeRegistry } from '../controlNodeRegistry';
import { RigConfigurationError } from '../errors';
import type { MetarigIndex, SkinRigType } from '../metarig';
import type { ComposedTransform } from '../parentAutomation';
import type { RigGenerationConfig } from '../rigConfig';
import { fallbackBoneLength, type RigBuildContext } from '../rigContext';
import type { RigLog } from '../rigLog';
import { EPSILON, type Quat } from '../vectorMath';

export interface RegistrationContext {
  readonly metarig: MetarigIndex;
  readonly registry: ControlNodeRegistry;
  readonly config: RigGenerationConfig;
  readonly log: RigLog;
}

export type ComposedTransforms = ReadonlyMap<number, ComposedTransform>;

/** One skin rig instance, attached to its base bone in the metarig. */
export interface SkinGenerator {
  readonly kind: SkinRigType;
  readonly base: string;
  /** Phase 1. Chain generators return the chain they bridge. */
  registerNodes(context: RegistrationContext): ChainSpec | null;
  /** Phase 2a, registry frozen. */
  buildChain(context: RigBuildContext, options: ChainBuildOptions): ChainBuildResult | null;
  /** Phase 2c, every control bone exists. */
  finalize(context: RigBuildContext, composed: ComposedTransforms): void;
}

export const chainIdentity = (
  metarig: MetarigIndex,
  base: string,
  kind: SkinRigType,
  priority: number
): ChainIdentity => ({
  id: base,
  kind,
  depth: metarig.depth(base),
  priority,
});

/**
 * Orientation for the controls of a generator: its own at index 0, else the
 * rest orientation of the n-th metarig ancestor.
 */
export const controlOrientation = (
  metarig: MetarigIndex,
  base: string,
  kind: SkinRigType,
  index: number,
  own: Quat
): Quat => {
  if (index === 0) return own;
  const ancestors = metarig.ancestors(base);
  if (index > ancestors.length) {
    throw new RigConfigurationError(
      `Control rotation index ${index} exceeds the ${ancestors.length} available parents`,
      { bone: base, generator: kind }
    );
  }
  return metarig.frame(ancestors[index - 1]).rotation;
};

/** Control display size, never zero even for degenerate bones. */
export const controlSize = (size: number, config: RigGenerationConfig): number =>
  size > EPSILON ? size : fallbackBoneLength(config);
