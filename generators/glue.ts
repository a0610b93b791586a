import type { GlueParams } from '../adapters/metarigSchema';
import type { ControlNode } from '../controlNodeRegistry';
import { RigConfigurationError } from '../errors';
import { RELINK_TAIL_SPEC, relinkConstraint, type RelinkResolver } from '../relinkConstraints';
import { orgName, rigParentBone, type RigBuildContext } from '../rigContext';
import { deriveName } from '../symmetryNaming';
import type { Vec3 } from '../vectorMath';
import type { SkinGenerator } from './skinGenerator';

const queryControl = (context: RigBuildContext, base: string, point: Vec3, end: 'head' | 'tail'): ControlNode => {
  const node = context.registry.query(point, context.metarig.rootOf(base));
  if (!node) {
    throw new RigConfigurationError(`Glue bone ${end} does not touch any control node`, {
      bone: base,
      generator: 'skin.glue',
    });
  }
  return node;
};

/**
 * Glues its org bone (and the constraints authored on it) to the control
 * found at the bone head. Never claims a node.
 */
export const createGlueGenerator = (base: string, params: GlueParams): SkinGenerator => ({
  kind: 'skin.glue',
  base,

  registerNodes: () => null,

  buildChain: () => null,

  finalize: (context, composed) => {
    const { graph, metarig, log } = context;
    const bone = metarig.bone(base);
    const org = orgName(base);
    const head = queryControl(context, base, bone.head, 'head');
    const useTail = params.relinkConstraints && params.useTail;

    let tailTarget: string | null = null;
    if (useTail) {
      const tail = queryControl(context, base, bone.tail, 'tail');
      tailTarget = tail.name;
      if (params.tailReparent) {
        tailTarget = deriveName(base, 'mch', '_tail_reparent');
        graph.copyBone(tail.name, tailTarget, 'mch');
        graph.setParent(tailTarget, rigParentBone(context, base), { inheritScale: 'AVERAGE' });
        graph.addConstraint(tailTarget, 'COPY_TRANSFORMS', {
          targets: [tail.name],
          settings: { target_space: 'LOCAL', owner_space: 'LOCAL' },
        });
      }
    }

    const resolve: RelinkResolver = (spec, oldTarget) => {
      if (spec === RELINK_TAIL_SPEC || (spec === '' && oldTarget === '')) {
        if (tailTarget) return tailTarget;
        log.warn('unresolved-relink', 'No tail control to relink to; keeping the current target', {
          bone: base,
          generator: 'skin.glue',
        });
        return null;
      }
      if (spec === '') return null;
      return metarig.has(spec) ? orgName(spec) : spec;
    };

    // Authored constraints act on the control, not on the org bone
    graph.takeConstraints(org).forEach((constraint) => {
      const moved = params.relinkConstraints
        ? relinkConstraint(constraint, resolve, { relinkUnmarked: useTail, bone: base })
        : constraint;
      graph.attachConstraint(head.name, moved);
    });

    switch (params.headMode) {
      case 'child':
        graph.setParent(org, head.name, { inheritScale: 'AVERAGE' });
        break;
      case 'mirror':
        graph.setParent(org, composed.get(head.id)?.parentBone ?? rigParentBone(context, base), {
          inheritScale: 'AVERAGE',
        });
        graph.addConstraint(org, 'COPY_TRANSFORMS', { targets: [head.name] });
        break;
      case 'reparent':
        graph.setParent(org, rigParentBone(context, base), { inheritScale: 'AVERAGE' });
        graph.addConstraint(org, 'COPY_TRANSFORMS', { targets: [head.name] });
        break;
    }
  },
});
