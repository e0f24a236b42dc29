import { z } from 'zod';
import {
  DEFAULT_JOB_COUNT,
  DEFAULT_SILENCE_THRESH_DB,
  DEFAULT_TARGET_LUFS,
  FLAC_MAX_BIT_DEPTH
} from '../constants/limits';
import { OUTPUT_FORMATS } from '../constants/formats';
import { ConfigError } from '../errors/config.error';

export const bitDepthSchema = z.union([z.literal(16), z.literal(24), z.literal(32)]);

export const outputFormatSchema = z.enum(OUTPUT_FORMATS);

/**
 * Processing configuration, constructed once per run
 */
export const processingConfigSchema = z.object({
  targetSampleRate: z.number().int().positive().optional().describe('Output sample rate in Hz (source rate when absent)'),
  targetBitDepth: bitDepthSchema.optional().describe('Output bit depth (source depth when absent)'),
  trimSilence: z.boolean().default(false).describe('Trim leading and trailing silence'),
  normalize: z.boolean().default(false).describe('Normalize integrated loudness'),
  targetLUFS: z.number().finite().default(DEFAULT_TARGET_LUFS).describe('Target integrated loudness in LUFS'),
  silenceThreshDb: z.number().finite().positive().default(DEFAULT_SILENCE_THRESH_DB).describe('Silence threshold magnitude in dB below full scale'),
  jobCount: z.number().int().min(1).default(DEFAULT_JOB_COUNT).describe('Number of concurrent workers'),
  outputFormat: outputFormatSchema.default('wav').describe('Container and codec of written files'),
  skipExisting: z.boolean().default(false).describe('Leave existing destination files untouched')
}).superRefine((config, ctx) => {
  if (config.outputFormat === 'flac' && config.targetBitDepth !== undefined && config.targetBitDepth > FLAC_MAX_BIT_DEPTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['targetBitDepth'],
      message: `FLAC supports at most ${FLAC_MAX_BIT_DEPTH}-bit`
    });
  }
});

export type ProcessingConfig = Readonly<z.infer<typeof processingConfigSchema>>;
export type ProcessingConfigInput = z.input<typeof processingConfigSchema>;

/**
 * Validate raw options into a frozen config
 * @throws ConfigError listing every invalid field
 */
export function parseProcessingConfig(input: unknown): ProcessingConfig {
  const result = processingConfigSchema.safeParse(input);

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid processing config: ${details}`, result.error.issues);
  }

  return Object.freeze(result.data);
}
