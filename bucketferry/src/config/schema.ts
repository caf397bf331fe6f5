import { ConfigUtils, z } from '@bucketferry/configuration';
import { LOG_FORMATS, LOG_LEVELS } from '@bucketferry/logging';

// An empty YAML key (`starts_with:`) parses as null
const patternList = z
  .array(z.string().min(1, 'Ignore patterns cannot be empty'))
  .nullish()
  .transform(patterns => patterns ?? []);

export const IgnorePatternSchema = z.object({
  starts_with: patternList,
  ends_with: patternList,
  contains: patternList,
});

export const RetrySchema = z
  .object({
    max_attempts: z.number().int().min(1, 'At least one attempt is required').default(5),
    base_delay_ms: z.number().int().nonnegative().default(1000),
    max_delay_ms: z.number().int().nonnegative().default(30000),
  })
  .refine(retry => retry.max_delay_ms >= retry.base_delay_ms, {
    message: 'max_delay_ms must not be lower than base_delay_ms',
    path: ['max_delay_ms'],
  });

export const AwsSchema = z.object({
  region: z.string().min(1).optional(),
  endpoint: z.string().url('Endpoint must be a URL').optional(),
  force_path_style: z.boolean().optional(),
});

export const LoggingSchema = z.object({
  level: z
    .string()
    .transform(level => level.toUpperCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('INFO'),
  format: z.enum(LOG_FORMATS).default('text'),
  file: z.string().min(1).optional(),
  max_size: z.string().default('10MB'),
  max_files: z.number().int().min(1).default(5),
});

export const AppConfigSchema = z.object({
  ignore_pattern: IgnorePatternSchema.default({}),
  target_path: z.string().min(1, 'Target path cannot be empty').default('./s3_download'),
  delete_after_download: z.boolean().default(false),
  concurrency: z.number().int().min(1, 'Concurrency must be at least 1').default(1),
  segment_size: ConfigUtils.sizeTransformer()
    .default('8MB')
    .refine(size => size > 0, 'Segment size must be positive'),
  retry: RetrySchema.default({}),
  aws: AwsSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type IgnorePatternConfig = AppConfig['ignore_pattern'];
