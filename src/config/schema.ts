import { join } from 'node:path';
import { z } from 'zod';
import { ListingValidatorError } from '../errors/index.js';

export const ValidatorConfigSchema = z.object({
  fastlanePath: z.string().min(1).default('./fastlane'),
  enableGaAnnotations: z.boolean().default(false),
  checkLocales: z.boolean().default(false),
  format: z.enum(['text', 'json']).default('text'),
});

export type ValidatorConfig = z.infer<typeof ValidatorConfigSchema>;
export type ValidatorConfigInput = z.input<typeof ValidatorConfigSchema>;

export function loadConfig(input: unknown): ValidatorConfig {
  const result = ValidatorConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const msg = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ListingValidatorError({
      code: 'INVALID_CONFIG',
      message: `Invalid validator config: ${msg}`,
      details: { issues: result.error.errors.length },
    });
  }
  return result.data;
}

/** Android listings live at `<fastlanePath>/metadata/android`. */
export function resolveMetadataRoot(config: Pick<ValidatorConfig, 'fastlanePath'>): string {
  return join(config.fastlanePath, 'metadata', 'android');
}
