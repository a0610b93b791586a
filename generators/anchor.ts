import type { AnchorParams } from '../adapters/metarigSchema';
import type { NodeHandle } from '../controlNodeRegistry';
import { RigConfigurationError } from '../errors';
import { orgName } from '../rigContext';
import { deriveName } from '../symmetryNaming';
import { chainIdentity, controlOrientation, controlSize, type SkinGenerator } from './skinGenerator';

/** Single control at the bone head that always wins its node. */
export const createAnchorGenerator = (base: string, params: AnchorParams): SkinGenerator => {
  let handle: NodeHandle | null = null;

  return {
    kind: 'skin.anchor',
    base,

    registerNodes: ({ metarig, registry, config }) => {
      const bone = metarig.bone(base);
      handle = registry.register({
        chain: chainIdentity(metarig, base, 'skin.anchor', 0),
        index: 0,
        name: base,
        orgBone: base,
        position: bone.head,
        orientation: controlOrientation(
          metarig,
          base,
          'skin.anchor',
          params.controlRotationIndex,
          metarig.frame(base).rotation
        ),
        size: controlSize(metarig.length(base), config),
        role: 'anchor',
        mergeScope: metarig.rootOf(base),
        mergeParentTransform: params.mergeParentRotationScale,
      });
      return null;
    },

    buildChain: () => null,

    finalize: ({ graph, registry }) => {
      if (!handle) {
        throw new RigConfigurationError('Anchor was not registered', { bone: base, generator: 'skin.anchor' });
      }
      const control = registry.node(handle).name;
      const org = orgName(base);
      graph.setParent(org, control);

      if (params.makeDeform) {
        const def = deriveName(base, 'def');
        graph.copyBone(org, def, 'def');
        graph.setParent(def, org, { useConnect: false });
      }
    },
  };
};
