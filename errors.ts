export interface RigErrorContext {
  bone?: string;
  generator?: string;
}

const describeContext = ({ bone, generator }: RigErrorContext): string => {
  const parts = [bone ? `bone "${bone}"` : null, generator ? `generator ${generator}` : null].filter(
    (part): part is string => part !== null
  );
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
};

/** Metarig problem the author has to fix; aborts the whole rebuild. */
export class RigConfigurationError extends Error {
  readonly bone?: string;
  readonly generator?: string;

  constructor(message: string, context: RigErrorContext = {}) {
    super(`${message}${describeContext(context)}`);
    this.name = 'RigConfigurationError';
    this.bone = context.bone;
    this.generator = context.generator;
  }
}

export class RegistryFrozenError extends Error {
  constructor(nodeName: string) {
    super(`Control node "${nodeName}" registered after the registry was frozen`);
    this.name = 'RegistryFrozenError';
  }
}

/** The finished graph points at bones nobody created. */
export class RigIntegrityError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Generated rig is inconsistent:\n${problems.join('\n')}`);
    this.name = 'RigIntegrityError';
    this.problems = problems;
  }
}
