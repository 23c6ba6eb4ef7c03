import { z } from "zod";

/**
 * Wind thresholds (kt) for nested impact rings, outermost first.
 */
export const WIND_THRESHOLDS = [34, 50, 64] as const;
export const WindThresholdSchema = z.union([z.literal(34), z.literal(50), z.literal(64)]);
export type WindThreshold = z.infer<typeof WindThresholdSchema>;

/** Optional radius: absent / null = no data (never zero). Negative values are rejected by the Track Store. */
const OptionalRadiusSchema = z.number().nullish();

/**
 * Raw row shape accepted by the Track Store (before range checks).
 * Numeric checks (finite, ranges, non-negative radii) live in validateTrackSample so
 * every failure maps onto a MalformedSampleError with a readable reason.
 */
export const RawTrackSampleSchema = z.object({
  stormId: z.string().min(1),
  memberId: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
  validTime: z.string().min(1), // ISO datetime
  latitude: z.number(),
  longitude: z.number(),
  centralPressureHpa: z.number().nullish(),
  maxSustainedWindKt: z.number().nullish(),
  windRadius34Km: OptionalRadiusSchema,
  windRadius50Km: OptionalRadiusSchema,
  windRadius64Km: OptionalRadiusSchema,
});
export type RawTrackSample = z.input<typeof RawTrackSampleSchema>;

/** Validated, immutable sample. Keyed by (stormId, memberId, validTime). */
export type TrackSample = {
  readonly stormId: string;
  readonly memberId: string;
  /** ISO-8601 UTC. */
  readonly validTime: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly centralPressureHpa?: number;
  readonly maxSustainedWindKt?: number;
  readonly windRadius34Km?: number;
  readonly windRadius50Km?: number;
  readonly windRadius64Km?: number;
};

/** Ordered samples for one (stormId, memberId); validTime strictly increasing. */
export type Trajectory = {
  readonly stormId: string;
  readonly memberId: string;
  readonly samples: readonly TrackSample[];
};

/** Forecast init time per storm (ISO), used for lead-time uncertainty growth. */
export type InitTimes = Readonly<Record<string, string>>;
