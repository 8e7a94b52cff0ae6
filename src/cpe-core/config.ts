import { z } from 'zod';
import {
  DEFAULT_CERTIFICATION_FIELDS,
  DEFAULT_MAX_CREDITS,
  DEFAULT_START_GRACE_MINUTES,
  LATE_JOIN_POLICIES,
} from '@shared/constants';
import { ConfigError } from './errors';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const cpeConfigSchema = z
  .object({
    maxCredits: z.number().positive().default(DEFAULT_MAX_CREDITS),
    startGracePeriod: z.number().int().min(0).default(DEFAULT_START_GRACE_MINUTES),
    start: z.string().min(1).optional(),
    end: z.string().min(1).optional(),
    businessEnd: z.string().min(1).optional(),
    title: z.string().default(''),
    lateJoinPolicy: z.enum(LATE_JOIN_POLICIES).default('reset'),
    certificationFields: z
      .array(z.string().min(1))
      .min(1)
      .default(() => [...DEFAULT_CERTIFICATION_FIELDS]),
    /** File name offered when a stored report is downloaded as CSV. */
    output: z.string().min(1).optional(),
  })
  .strict();

export const seedAttendeeSchema = z
  .object({
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    certification: z.union([z.string(), z.number()]).transform(String).optional(),
    credits: z.number().min(0).optional(),
  })
  .strict();

/** Settings plus hand-entered attendees (hosts and speakers the export misses). */
export const cpeOverrideSchema = z.object({
  config: cpeConfigSchema.partial().optional(),
  attendees: z.record(z.string().min(1), seedAttendeeSchema).optional(),
});

export type CpeConfig = z.output<typeof cpeConfigSchema>;
export type CpeConfigInput = z.input<typeof cpeConfigSchema>;
export type SeedAttendee = z.infer<typeof seedAttendeeSchema>;
export type CpeOverride = z.infer<typeof cpeOverrideSchema>;
export type LateJoinPolicy = CpeConfig['lateJoinPolicy'];

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Applies defaults to a partial configuration. Unknown keys and invalid
 * values are rejected before any report data is touched.
 */
export function resolveConfig(input: unknown = {}): CpeConfig {
  const result = cpeConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ConfigError(`invalid configuration: ${detail}`);
  }
  return result.data;
}

export function parseOverride(input: unknown): CpeOverride {
  const result = cpeOverrideSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`invalid override document: ${detail}`);
  }
  return result.data;
}
