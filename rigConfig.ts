import { z } from 'zod';
import { RigConfigurationError } from './errors';

export const rigConfigSchema = z.object({
  mergeTolerance: z.number().positive().default(1e-4),
  rootBone: z.string().min(1).default('root'),
  echoLog: z.boolean().default(false),
  defaultSegments: z.number().int().min(1).default(10),
  defaultSharpenAngle: z.number().gt(0).max(180).default(90),
});

export type RigGenerationConfig = z.infer<typeof rigConfigSchema>;
export type RigGenerationConfigInput = z.input<typeof rigConfigSchema>;

export const DEFAULT_RIG_CONFIG: RigGenerationConfig = Object.freeze(rigConfigSchema.parse({}));

export const resolveRigConfig = (input: RigGenerationConfigInput = {}): RigGenerationConfig => {
  const parsed = rigConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RigConfigurationError(`Invalid generation config at "${issue.path.join('.')}": ${issue.message}`);
  }
  return parsed.data;
};
