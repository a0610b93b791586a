export { generateRig, createSkinGenerator } from './rigBuilder';
export type { RigBuildOptions, RigBuildResult } from './rigBuilder';

export { falloffWeight, falloffSpecWeight, isFalloffEnabled, FALLOFF_DISABLED, FALLOFF_MAX } from './falloff';
export type { FalloffFn, FalloffSpec } from './falloff';

export {
  parseSymmetryName,
  formatSymmetryName,
  symmetryKey,
  areSymmetrySiblings,
  mirrorSymmetryName,
  deriveName,
} from './symmetryNaming';
export type { ParsedName, SymmetryKey, SymmetryTag } from './symmetryNaming';

export { ControlNodeRegistry, NodeHandle, DEFAULT_MERGE_TOLERANCE } from './controlNodeRegistry';
export type { ControlNode, ControlPointRequest, NodeClaim, ControlRole } from './controlNodeRegistry';

export { resolveOwnership, ownershipRankKey, compareOwnershipRank, findMirrorClaim } from './ownershipResolver';
export type { OwnershipCandidate, OwnershipRankKey, OwnershipResolution } from './ownershipResolver';

export { buildChainDeformation, computeCornerEase, findChainConnection } from './chainDeformation';
export type { ChainSpec, ChainBuildResult, PropagationSettings } from './chainDeformation';

export { composeNodeTransform, averageRotation } from './parentAutomation';
export type { ComposedTransform } from './parentAutomation';

export { relinkConstraint, parseRelinkMarker } from './relinkConstraints';

export { parseMetarig, metarigInputSchema } from './adapters/metarigSchema';
export type { MetarigInput } from './adapters/metarigSchema';
export { MetarigIndex } from './metarig';
export type { Metarig, MetarigBone } from './metarig';
export { RigGraph } from './rigGraph';
export type { RigBone, RigConstraint, RigDriver, RigProperty, DriverVariable } from './rigGraph';
export { resolveRigConfig, rigConfigSchema, DEFAULT_RIG_CONFIG } from './rigConfig';
export type { RigGenerationConfig, RigGenerationConfigInput } from './rigConfig';
export { RigLog } from './rigLog';
export type { RigLogEntry, RigWarningCode } from './rigLog';
export { RigConfigurationError, RegistryFrozenError, RigIntegrityError } from './errors';
