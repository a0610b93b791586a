import { describe, expect, it } from 'vitest';
import type { MetarigInput } from './adapters/metarigSchema';
import { RigConfigurationError } from './errors';
import { averageRotation } from './parentAutomation';
import { generateRig } from './rigBuilder';
import { RigLog } from './rigLog';
import { quatAngle } from './vectorMath';

type BoneInput = MetarigInput['bones'][number];

const face: BoneInput = { name: 'face', head: [0, 0, -1], tail: [0, 0, 0] };

const sharedEndMetarig = (lidParams: Record<string, unknown> = {}): MetarigInput => ({
  bones: [
    face,
    { name: 'brow.L', parent: 'face', head: [1, 0, 0], tail: [2, 0, 0], rigType: 'skin.basic_chain' },
    { name: 'lid.L', parent: 'brow.L', head: [2, 0, 0], tail: [3, 0, 0], rigType: 'skin.basic_chain', params: lidParams },
  ],
});

describe('generateRig', () => {
  it('gives a shared node to the chain closer to the root', () => {
    const { nodes, graph } = generateRig(sharedEndMetarig());
    const shared = nodes.find((node) => node.claims.length === 2);

    expect(shared?.name).toBe('brow_end.L');
    expect(shared?.claims.map((claim) => claim.chain.id)).toEqual(['brow.L', 'lid.L']);
    expect(graph.get('ORG-lid.L').constraints[0].targets).toEqual([{ bone: 'brow_end.L' }]);
    expect(graph.has('lid.L')).toBe(false);
  });

  it('lets an explicit priority override depth', () => {
    const { nodes } = generateRig(sharedEndMetarig({ priority: 10 }));
    expect(nodes.find((node) => node.claims.length === 2)?.name).toBe('lid.L');
  });

  it('warns about a zero-length chain segment and still builds the chain', () => {
    const { warnings, graph, nodes } = generateRig({
      bones: [
        face,
        { name: 'lip.L', parent: 'face', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.stretchy_chain' },
        { name: 'lip2.L', parent: 'lip.L', connected: true, head: [1, 0, 0], tail: [1, 0, 0] },
        { name: 'lip3.L', parent: 'lip2.L', connected: true, head: [1, 0, 0], tail: [2, 0, 0] },
      ],
    });

    expect(warnings).toContainEqual({
      type: 'warn',
      code: 'degenerate-segment',
      message: 'Chain segment has zero length; its ends share one control',
      bone: 'lip2.L',
      generator: 'skin.stretchy_chain',
      node: 'lip2.L',
    });
    expect(warnings).toContainEqual({
      type: 'warn',
      code: 'zero-length-bone',
      message: 'Bone has zero length; using a default direction',
      bone: 'lip2.L',
    });
    expect(nodes.find((node) => node.name === 'lip2.L')?.claims.map((claim) => claim.name)).toEqual([
      'lip2.L',
      'lip3.L',
    ]);
    const org = graph.get('ORG-lip2.L');
    expect(org.tail.x).toBe(1);
    expect(org.tail.y).toBeCloseTo(0.01, 12);
    expect(graph.get('DEF-lip2.L').tail).toEqual(org.tail);
  });

  it('copies every metarig bone under the generated root', () => {
    const { graph } = generateRig(sharedEndMetarig());
    expect(graph.get('root').role).toBe('root');
    expect(graph.get('ORG-face').parent).toBe('root');
    expect(graph.get('ORG-brow.L').parent).toBe('ORG-face');
    expect(graph.byRole('ctrl').map((bone) => bone.name).sort()).toEqual(['brow.L', 'brow_end.L', 'lid_end.L']);
    expect(graph.byRole('def').map((bone) => bone.name).sort()).toEqual(['DEF-brow.L', 'DEF-lid.L']);
  });

  describe('symmetric chains sharing a node', () => {
    const metarig: MetarigInput = {
      bones: [
        { name: 'chest', head: [0, 0, -1], tail: [0, 0, 0] },
        { name: 'shoulder.L', parent: 'chest', head: [0, 0, 0], tail: [1, 0, 0] },
        { name: 'shoulder.R', parent: 'chest', head: [0, 0, 0], tail: [-1, 0, 0] },
        { name: 'arm.L', parent: 'shoulder.L', head: [0, 0, 0], tail: [1, 0, 1], rigType: 'skin.basic_chain' },
        { name: 'arm.R', parent: 'shoulder.R', head: [0, 0, 0], tail: [-1, 0, 1], rigType: 'skin.basic_chain' },
      ],
    };

    it('averages the orientation over both sides', () => {
      const { nodes, transforms } = generateRig(metarig);
      const shared = nodes.find((node) => node.name === 'arm.L');
      const composed = transforms.find((transform) => transform.control === 'arm.L');
      const [left, right] = shared?.symmetryGroup ?? [];

      expect(shared?.symmetryGroup?.map((claim) => claim.name)).toEqual(['arm.L', 'arm.R']);
      expect(composed?.averaged).toBe(true);
      const swapped = averageRotation([right.orientation, left.orientation]);
      expect(quatAngle(composed?.rotation ?? left.orientation, swapped)).toBeCloseTo(0, 6);
      expect(quatAngle(left.orientation, right.orientation)).toBeGreaterThan(0.1);
      expect(quatAngle(composed?.rotation ?? left.orientation, left.orientation)).toBeGreaterThan(0.05);
    });

    it('mixes the parents of both sides', () => {
      const { graph, transforms } = generateRig(metarig);
      const composed = transforms.find((transform) => transform.control === 'arm.L');
      const mix = graph.get('MCH-arm_mix_parent.L');

      expect(composed?.parents).toEqual(['ORG-shoulder.L', 'ORG-shoulder.R']);
      expect(graph.get('arm.L').parent).toBe('MCH-arm_mix_parent.L');
      expect(mix.constraints[0].kind).toBe('ARMATURE');
      expect(mix.constraints[0].targets).toEqual([
        { bone: 'ORG-shoulder.L', weight: 0.5 },
        { bone: 'ORG-shoulder.R', weight: 0.5 },
      ]);
    });

    it('drives each mix weight from a slider on the control', () => {
      const { graph } = generateRig(metarig);
      const control = graph.get('arm.L');
      const mix = graph.get('MCH-arm_mix_parent.L');

      expect(Object.keys(control.properties)).toEqual(['parent_weight_0', 'parent_weight_1']);
      expect(control.properties.parent_weight_1.description).toBe('Follow ORG-shoulder.R');
      expect(control.properties.parent_weight_1.value).toBe(0.5);
      expect(mix.drivers.map((driver) => [driver.property, driver.index, driver.variables.var])).toEqual([
        ['constraints.armature.targets.weight', 0, { type: 'SINGLE_PROP', bone: 'arm.L', property: 'parent_weight_0' }],
        ['constraints.armature.targets.weight', 1, { type: 'SINGLE_PROP', bone: 'arm.L', property: 'parent_weight_1' }],
      ]);
    });

    it('joins the mirrored chain ends into one tangent', () => {
      const { chains, graph } = generateRig(metarig);
      const left = chains.find((chain) => chain.chainId === 'arm.L');

      expect(left?.connections.map((link) => [link.side, link.mode, link.partnerChain, link.neighbor.name])).toEqual([
        ['start', 'mirror', 'arm.R', 'arm_end.R'],
      ]);
      expect(graph.get('MCH-arm_handle.L').constraints[0].targets).toEqual([{ bone: 'arm_end.R' }]);
    });
  });

  describe('anchors', () => {
    const metarig: MetarigInput = {
      bones: [
        face,
        { name: 'mouth', parent: 'face', head: [0, 0, 0], tail: [0, 0, 1], rigType: 'skin.anchor' },
        { name: 'nose', parent: 'face', head: [0, 1, 0], tail: [0, 1, 1], rigType: 'skin.anchor', params: { hideUnlessMerged: true } },
        { name: 'lip.L', parent: 'face', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.basic_chain' },
      ],
    };

    it('always owns the node it sits on', () => {
      const { nodes, graph } = generateRig(metarig);
      expect(nodes.find((node) => node.claims.length === 2)?.name).toBe('mouth');
      expect(graph.get('ORG-mouth').parent).toBe('mouth');
      expect(graph.get('DEF-mouth').parent).toBe('ORG-mouth');
      expect(graph.get('ORG-lip.L').constraints[0].targets).toEqual([{ bone: 'mouth' }]);
    });

    it('hides a lone control only when asked', () => {
      const { graph } = generateRig(metarig);
      expect(graph.get('mouth').hidden).toBe(false);
      expect(graph.get('nose').hidden).toBe(true);
    });

    it('gives each of two coincident anchors its own control', () => {
      const shared: MetarigInput = {
        bones: [
          face,
          { name: 'mouth', parent: 'face', head: [0, 0, 0], tail: [0, 0, 1], rigType: 'skin.anchor' },
          { name: 'mouth.001', parent: 'face', head: [0, 0, 0], tail: [0, 1, 0], rigType: 'skin.anchor' },
          { name: 'lip.L', parent: 'face', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.basic_chain' },
        ],
      };
      const { nodes, graph } = generateRig(shared);

      expect(nodes.filter((node) => node.owner.chain.kind === 'skin.anchor').map((node) => node.name)).toEqual([
        'mouth',
        'mouth.001',
      ]);
      expect(nodes.find((node) => node.name === 'mouth')?.claims.map((claim) => claim.name)).toEqual(['mouth', 'lip.L']);
      expect(graph.get('ORG-mouth').parent).toBe('mouth');
      expect(graph.get('ORG-mouth.001').parent).toBe('mouth.001');
    });
  });

  describe('glue', () => {
    const metarig = (params: Record<string, unknown>, head: [number, number, number] = [1, 0, 0]): MetarigInput => ({
      bones: [
        face,
        { name: 'lip.L', parent: 'face', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.basic_chain' },
        { name: 'brow.L', parent: 'face', head: [1, 1, 0], tail: [2, 1, 0], rigType: 'skin.basic_chain' },
        {
          name: 'cheek.L',
          parent: 'face',
          head,
          tail: [1, 1, 0],
          rigType: 'skin.glue',
          params,
          constraints: [
            { name: 'follow@TARGET', kind: 'COPY_LOCATION' },
            { name: 'aim@lip.L', kind: 'DAMPED_TRACK', subtargets: ['face'] },
          ],
        },
      ],
    });

    it('relinks authored constraints and moves them to the control', () => {
      const { graph } = generateRig(metarig({ relinkConstraints: true, useTail: true }));

      expect(graph.get('ORG-cheek.L').parent).toBe('lip_end.L');
      expect(graph.get('ORG-cheek.L').constraints).toEqual([]);
      expect(graph.get('lip_end.L').constraints.map((c) => [c.name, c.targets.map((t) => t.bone)])).toEqual([
        ['follow', ['brow.L']],
        ['aim', ['ORG-lip.L']],
      ]);
    });

    it('copies the control transform in mirror mode', () => {
      const { graph } = generateRig(metarig({ headMode: 'mirror' }));
      const org = graph.get('ORG-cheek.L');

      expect(org.parent).toBe('ORG-face');
      expect(org.constraints.map((c) => [c.kind, c.targets.map((t) => t.bone)])).toEqual([
        ['COPY_TRANSFORMS', ['lip_end.L']],
      ]);
      expect(graph.get('lip_end.L').constraints.map((c) => c.name)).toEqual(['follow@TARGET', 'aim@lip.L']);
    });

    it('parents to the control parent in mirror mode and to the glue parent in reparent mode', () => {
      const underBrow = (headMode: string): MetarigInput => {
        const input = metarig({ headMode });
        return {
          bones: input.bones.map((bone) => (bone.name === 'cheek.L' ? { ...bone, parent: 'brow.L' } : bone)),
        };
      };
      const mirrored = generateRig(underBrow('mirror')).graph.get('ORG-cheek.L');
      const reparented = generateRig(underBrow('reparent')).graph.get('ORG-cheek.L');

      expect(mirrored.parent).toBe('ORG-face');
      expect(reparented.parent).toBe('ORG-brow.L');
      expect(reparented.constraints.map((c) => [c.kind, c.targets.map((t) => t.bone)])).toEqual([
        ['COPY_TRANSFORMS', ['lip_end.L']],
      ]);
    });

    it('fails when nothing sits at the glue head', () => {
      expect(() => generateRig(metarig({}, [5, 5, 5]))).toThrow(/does not touch any control node/);
    });
  });

  it('logs bones owned by other rig types and leaves them as plain org bones', () => {
    const log = new RigLog();
    const { graph } = generateRig(
      { bones: [{ name: 'arm.L', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'limbs.arm' }] },
      {},
      { log }
    );

    expect(graph.get('ORG-arm.L').parent).toBe('root');
    expect(log.getEntries('info')[0]).toEqual({
      type: 'info',
      message: 'Rig type "limbs.arm" is handled outside the skin system',
      code: 'unhandled-rig-type',
      bone: 'arm.L',
      generator: 'limbs.arm',
    });
  });

  it('reports configuration problems with the offending bone', () => {
    expect(() =>
      generateRig({
        bones: [{ name: 'lip.L', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.stretchy_chain' }],
      })
    ).toThrow('Stretchy chain needs at least 2 connected bones (bone "lip.L", generator skin.stretchy_chain)');
    expect(() => generateRig(sharedEndMetarig(), { mergeTolerance: 0 })).toThrow(RigConfigurationError);
    expect(() => generateRig({ bones: [{ name: 'root', head: [0, 0, 0], tail: [0, 1, 0] }] })).toThrow(
      RigConfigurationError
    );
  });
});
