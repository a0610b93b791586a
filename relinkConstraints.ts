import { RigConfigurationError } from './errors';
import type { RigConstraint } from './rigGraph';

/** Spec that points a subtarget at the glue bone's tail control. */
export const RELINK_TAIL_SPEC = 'TARGET';

export interface RelinkMarker {
  /** Constraint name without the `@...` suffix. */
  name: string;
  /** `null` when the name carries no marker. */
  specs: string[] | null;
}

/**
 * Maps a relink spec and the current subtarget to the new subtarget.
 * Returning `null` keeps the current one.
 */
export type RelinkResolver = (spec: string, oldTarget: string) => string | null;

export const parseRelinkMarker = (constraintName: string): RelinkMarker => {
  const at = constraintName.indexOf('@');
  if (at < 0) {
    return { name: constraintName, specs: null };
  }
  return {
    name: constraintName.slice(0, at),
    specs: constraintName
      .slice(at + 1)
      .split(',')
      .map((spec) => spec.trim()),
  };
};

/**
 * Rewrites the subtargets of one constraint. A single spec applies to every
 * target; otherwise there must be one spec per target. Constraints without a
 * marker are only touched when `relinkUnmarked` is set, as if every spec was
 * empty.
 */
export const relinkConstraint = (
  constraint: RigConstraint,
  resolve: RelinkResolver,
  options: { relinkUnmarked?: boolean; bone?: string } = {}
): RigConstraint => {
  const marker = parseRelinkMarker(constraint.name);
  const specs = marker.specs ?? (options.relinkUnmarked ? [''] : null);
  if (!specs) {
    return { ...constraint, targets: constraint.targets.map((target) => ({ ...target })) };
  }

  const targets = constraint.targets.length > 0 ? constraint.targets : [{ bone: '' }];
  if (specs.length !== 1 && specs.length !== targets.length) {
    throw new RigConfigurationError(
      `Constraint "${marker.name}" has ${specs.length} relink specs for ${targets.length} targets`,
      { bone: options.bone }
    );
  }

  const relinked = targets
    .map((target, i) => {
      const spec = specs.length === 1 ? specs[0] : specs[i];
      const bone = resolve(spec, target.bone) ?? target.bone;
      return { ...target, bone };
    })
    .filter((target) => target.bone !== '');

  return { ...constraint, name: marker.name, targets: relinked, settings: { ...constraint.settings } };
};
