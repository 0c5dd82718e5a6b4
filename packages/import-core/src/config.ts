import { z } from 'zod';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_FLUSH_ATTEMPTS,
  DEFAULT_TIME_FIELD
} from './constants';
import { ImportConfigurationError } from './errors';
import type { Precision } from './types';

export const IMPORT_FORMATS = ['line_protocol', 'csv', 'jsoni', 'jsonp'] as const;
export const PRECISIONS = ['s', 'ms', 'us', 'ns', ''] as const;

const PRECISION_MESSAGE = 'incorrect timestamp precision, only support (s, ms, us, ns)';

const nameListSchema = z.array(z.string().trim().min(1)).default([]);

export const importConfigSchema = z.object({
  path: z.string().trim().min(1).optional(),
  format: z.enum(IMPORT_FORMATS).default('line_protocol'),
  database: z.string().trim().default(''),
  retentionPolicy: z.string().trim().default(''),
  measurement: z.string().trim().default(''),
  tags: nameListSchema,
  fields: nameListSchema,
  timeField: z.string().trim().default(DEFAULT_TIME_FIELD),
  precision: z.enum(PRECISIONS, { errorMap: () => ({ message: PRECISION_MESSAGE }) }).default('ns'),
  batchSize: z
    .number()
    .int()
    .default(DEFAULT_BATCH_SIZE)
    .transform((value) => (value <= 0 ? DEFAULT_BATCH_SIZE : value)),
  columnWrite: z.boolean().default(false),
  username: z.string().default(''),
  password: z.string().default(''),
  maxFlushAttempts: z.number().int().min(1).default(DEFAULT_MAX_FLUSH_ATTEMPTS)
});

export type ImportConfig = z.output<typeof importConfigSchema>;
export type ImportConfigInput = z.input<typeof importConfigSchema>;

export function parseImportConfig(input: unknown): ImportConfig {
  const result = importConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ImportConfigurationError(`invalid import configuration: ${details}`, { fatal: true });
  }
  return result.data;
}

const TIME_MULTIPLIERS: Record<Precision, bigint> = {
  ns: 1n,
  '': 1n,
  us: 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n
};

function isPrecision(value: string): value is Precision {
  return PRECISIONS.some((entry) => entry === value);
}

export function resolveTimeMultiplier(precision: string): bigint {
  if (!isPrecision(precision)) {
    throw new ImportConfigurationError(PRECISION_MESSAGE, { fatal: true });
  }
  return TIME_MULTIPLIERS[precision];
}
