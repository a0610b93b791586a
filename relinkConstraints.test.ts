import { describe, expect, it } from 'vitest';
import { RigConfigurationError } from './errors';
import { parseRelinkMarker, relinkConstraint } from './relinkConstraints';
import type { RigConstraint } from './rigGraph';

const constraint = (name: string, targets: string[]): RigConstraint => ({
  kind: 'COPY_LOCATION',
  name,
  targets: targets.map((bone) => ({ bone })),
  influence: 0.5,
  settings: { use_offset: true },
});

const upper = (spec: string) => (spec === '' ? null : `ORG-${spec}`);

describe('parseRelinkMarker', () => {
  it('splits the name from its specs', () => {
    expect(parseRelinkMarker('follow@jaw, ,TARGET')).toEqual({ name: 'follow', specs: ['jaw', '', 'TARGET'] });
  });

  it('reports unmarked names', () => {
    expect(parseRelinkMarker('follow')).toEqual({ name: 'follow', specs: null });
  });
});

describe('relinkConstraint', () => {
  it('applies one spec per target and strips the marker', () => {
    const result = relinkConstraint(constraint('mix@jaw,', ['ORG-a', 'ORG-b']), upper);
    expect(result.name).toBe('mix');
    expect(result.targets).toEqual([{ bone: 'ORG-jaw' }, { bone: 'ORG-b' }]);
    expect(result.influence).toBe(0.5);
  });

  it('broadcasts a single spec', () => {
    const result = relinkConstraint(constraint('mix@jaw', ['ORG-a', 'ORG-b']), upper);
    expect(result.targets.map((t) => t.bone)).toEqual(['ORG-jaw', 'ORG-jaw']);
  });

  it('leaves unmarked constraints alone unless asked', () => {
    const source = constraint('copy', ['ORG-a']);
    expect(relinkConstraint(source, () => 'tail').targets).toEqual([{ bone: 'ORG-a' }]);
    expect(relinkConstraint(source, () => 'tail', { relinkUnmarked: true }).targets).toEqual([{ bone: 'tail' }]);
  });

  it('fills an empty target list through the resolver', () => {
    const result = relinkConstraint(constraint('copy@TARGET', []), (spec) => (spec === 'TARGET' ? 'lip_end.L' : null));
    expect(result.targets).toEqual([{ bone: 'lip_end.L' }]);
  });

  it('rejects mismatched spec counts', () => {
    expect(() => relinkConstraint(constraint('mix@a,b', ['x', 'y', 'z']), upper, { bone: 'glue' })).toThrow(
      RigConfigurationError
    );
  });
});
