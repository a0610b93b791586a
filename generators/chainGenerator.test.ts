import { describe, expect, it } from 'vitest';
import { parseMetarig, type MetarigInput } from '../adapters/metarigSchema';
import { RigConfigurationError } from '../errors';
import { MetarigIndex } from '../metarig';
import { generateRig } from '../rigBuilder';
import { IDENTITY_QUAT, rotateVec, vec3, type Vec3 } from '../vectorMath';
import { chainBones, chainOrientation, chainPoints } from './chainGenerator';
import { controlOrientation } from './skinGenerator';

const index = (input: MetarigInput) => new MetarigIndex(parseMetarig(input));

const expectVecClose = (actual: Vec3, expected: Vec3) => {
  expect(actual.x).toBeCloseTo(expected.x, 9);
  expect(actual.y).toBeCloseTo(expected.y, 9);
  expect(actual.z).toBeCloseTo(expected.z, 9);
};

const browInput: MetarigInput = {
  bones: [
    { name: 'brow.L', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.basic_chain' },
    { name: 'brow.L.001', parent: 'brow.L', connected: true, head: [1, 0, 0], tail: [2, 1, 0] },
  ],
};

describe('chainBones', () => {
  it('follows connected children until another rig starts', () => {
    const metarig = index({
      bones: [
        { name: 'lid.L', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.basic_chain' },
        { name: 'lid.L.001', parent: 'lid.L', connected: true, head: [1, 0, 0], tail: [2, 0, 0] },
        { name: 'lid.L.002', parent: 'lid.L.001', connected: true, head: [2, 0, 0], tail: [3, 0, 0], rigType: 'skin.anchor' },
      ],
    });
    expect(chainBones(metarig, 'lid.L')).toEqual(['lid.L', 'lid.L.001']);
  });
});

describe('chainPoints', () => {
  it('places a node on every head plus the final tail', () => {
    const points = chainPoints(index(browInput), ['brow.L', 'brow.L.001']);
    expect(points.map((point) => point.name)).toEqual(['brow.L', 'brow.L.001', 'brow_end.L.001']);
    expect(points.map((point) => point.orgBone)).toEqual(['brow.L', 'brow.L.001', 'brow.L.001']);
    expect(points[2].position).toEqual({ x: 2, y: 1, z: 0 });
  });
});

describe('chainOrientation', () => {
  it('points Y along the chain and X out of its bending plane', () => {
    const rotation = chainOrientation(index(browInput), ['brow.L', 'brow.L.001']);
    expectVecClose(rotateVec(vec3(0, 1, 0), rotation), vec3(2 / Math.sqrt(5), 1 / Math.sqrt(5), 0));
    expectVecClose(rotateVec(vec3(1, 0, 0), rotation), vec3(0, 0, 1));
  });

  it('uses the first bone roll axis for a straight chain', () => {
    const metarig = index({ bones: [{ name: 'lip.L', head: [0, 0, 0], tail: [1, 0, 0] }] });
    const rotation = chainOrientation(metarig, ['lip.L']);
    expectVecClose(rotateVec(vec3(0, 1, 0), rotation), vec3(1, 0, 0));
    expectVecClose(rotateVec(vec3(1, 0, 0), rotation), vec3(0, -1, 0));
  });
});

describe('controlOrientation', () => {
  const metarig = index({
    bones: [
      { name: 'head', head: [0, 0, 0], tail: [0, 0, 1] },
      { name: 'brow.L', parent: 'head', head: [1, 0, 0], tail: [2, 0, 0], rigType: 'skin.basic_chain' },
    ],
  });

  it('keeps the generator orientation at index 0', () => {
    const own = { x: 0, y: 0, z: 1, w: 0 };
    expect(controlOrientation(metarig, 'brow.L', 'skin.basic_chain', 0, own)).toBe(own);
  });

  it('takes the orientation of the n-th parent', () => {
    const rotation = controlOrientation(metarig, 'brow.L', 'skin.basic_chain', 1, { ...IDENTITY_QUAT });
    expectVecClose(rotateVec(vec3(0, 1, 0), rotation), vec3(0, 0, 1));
  });

  it('rejects an index past the root', () => {
    expect(() => controlOrientation(metarig, 'brow.L', 'skin.basic_chain', 2, { ...IDENTITY_QUAT })).toThrow(
      RigConfigurationError
    );
  });
});

describe('chain generators', () => {
  it('assigns end and middle roles along a basic chain', () => {
    const { nodes } = generateRig(browInput);
    expect(nodes.map((node) => [node.name, node.owner.role])).toEqual([
      ['brow.L', 'end'],
      ['brow.L.001', 'middle'],
      ['brow_end.L.001', 'end'],
    ]);
  });

  it('rejects a pivot past the last bone', () => {
    expect(() =>
      generateRig({
        bones: [
          { name: 'lip.L', head: [0, 0, 0], tail: [1, 0, 0], rigType: 'skin.stretchy_chain', params: { pivotPos: 2 } },
          { name: 'lip.L.001', parent: 'lip.L', connected: true, head: [1, 0, 0], tail: [2, 0, 0] },
        ],
      })
    ).toThrow('Pivot position 2 must be below the bone count 2');
  });
});
