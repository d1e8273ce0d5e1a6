/**
 * Schemas for the JSON documents the engine reads: store records, reference tables and
 * import files.
 */

import { z } from 'zod';
import { COUNT_KIND_NAMES, DIRECTIONS, type CountHeader } from './types.js';
import { isDateString, parseDateTime } from './utils/datetime.js';

const dateString = z.string().refine(isDateString, 'Date must be in YYYY-MM-DD format');
const dateTimeString = z
  .string()
  .refine((value) => parseDateTime(value) !== null, 'Datetime must be in YYYY-MM-DD HH:MM[:SS] format');
const direction = z.enum(DIRECTIONS);
const count = z.number().int().min(0);
const lane = z.number().int().min(1).max(3);

// ============================================================================
// Store records
// ============================================================================

export const countHeaderSchema = z.object({
  recordnum: z.number().int().positive(),
  countKind: z.enum(COUNT_KIND_NAMES),
  mcd: z.string().nullable().default(null),
  fc: z.number().int().nullable().default(null),
  countType: z.string().nullable().default(null),
  bikePedGroup: z.string().nullable().default(null),
  indir: direction.nullable().default(null),
  outdir: direction.nullable().default(null),
  aadv: z.number().nullable().default(null),
  representativeDate: dateString.nullable().default(null),
  importDataDate: dateString.nullable().default(null),
  status: z.string().nullable().default(null),
  counterId: z.string().nullable().default(null),
  speedLimit: z.number().int().nullable().default(null),
}) satisfies z.ZodType<CountHeader, z.ZodTypeDef, unknown>;

const storedTimestamp = {
  countdate: dateString,
  counttime: dateTimeString,
};

const storedVolumeRow = z.object({
  ...storedTimestamp,
  lane,
  direction: direction.nullable(),
  total: count,
});

const storedClassRow = storedVolumeRow.extend({
  c1: count,
  c2: count,
  c3: count,
  c4: count,
  c5: count,
  c6: count,
  c7: count,
  c8: count,
  c9: count,
  c10: count,
  c11: count,
  c12: count,
  c13: count,
  c15: count,
});

const storedSpeedRow = storedVolumeRow.extend({
  s1: count,
  s2: count,
  s3: count,
  s4: count,
  s5: count,
  s6: count,
  s7: count,
  s8: count,
  s9: count,
  s10: count,
  s11: count,
  s12: count,
  s13: count,
  s14: count,
});

const storedBikePedRow = z.object({
  ...storedTimestamp,
  total: count,
  incount: count,
  outcount: count,
});

function hourlySlots<T extends z.ZodTypeAny>(value: T) {
  const slot = value.nullable();
  return z.object({
    am12: slot, am1: slot, am2: slot, am3: slot, am4: slot, am5: slot,
    am6: slot, am7: slot, am8: slot, am9: slot, am10: slot, am11: slot,
    pm12: slot, pm1: slot, pm2: slot, pm3: slot, pm4: slot, pm5: slot,
    pm6: slot, pm7: slot, pm8: slot, pm9: slot, pm10: slot, pm11: slot,
  });
}

const nonNormalKey = z.object({
  recordnum: z.number().int(),
  date: dateString,
  direction,
  lane,
});

const storedVolCount = nonNormalKey.merge(hourlySlots(count)).extend({
  setflag: z.number().int().nullable(),
  totalcount: count.nullable(),
});

const storedAvgSpeedCount = nonNormalKey.merge(hourlySlots(z.number()));

const aadvEntry = z.object({
  recordnum: z.number().int(),
  direction: direction.nullable(),
  aadv: z.number(),
  dateCalculated: dateString,
});

const importLogEntry = z.object({
  recordnum: z.number().int(),
  datetime: z.string(),
  level: z.enum(['error', 'warn', 'info', 'debug']),
  message: z.string(),
});

export const recordDocumentSchema = z.object({
  header: countHeaderSchema,
  classCounts: z.array(storedClassRow).default([]),
  speedCounts: z.array(storedSpeedRow).default([]),
  fifteenMinuteVolumes: z.array(storedVolumeRow).default([]),
  bicycleCounts: z.array(storedBikePedRow).default([]),
  pedestrianCounts: z.array(storedBikePedRow).default([]),
  volCounts: z.array(storedVolCount).default([]),
  avgSpeedCounts: z.array(storedAvgSpeedCount).default([]),
  aadv: z.array(aadvEntry).default([]),
  importLog: z.array(importLogEntry).default([]),
});

export type RecordDocument = z.infer<typeof recordDocumentSchema>;
export type StoredVolumeRow = z.infer<typeof storedVolumeRow>;
export type StoredClassRow = z.infer<typeof storedClassRow>;
export type StoredSpeedRow = z.infer<typeof storedSpeedRow>;
export type StoredBikePedRow = z.infer<typeof storedBikePedRow>;

// ============================================================================
// Reference tables
// ============================================================================

const factorKey = {
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  dayOfWeek: z.number().int().min(1).max(7),
};

export const referenceDocumentSchema = z.object({
  seasonalFactors: z
    .array(
      z.object({
        fc: z.number().int(),
        ...factorKey,
        paFactor: z.number(),
        paAxle: z.number(),
        njFactor: z.number(),
        njAxle: z.number(),
      }),
    )
    .default([]),
  bicycleFactors: z.array(z.object({ group: z.string(), ...factorKey, factor: z.number() })).default([]),
  pedestrianFactors: z.array(z.object({ month: factorKey.month, factor: z.number() })).default([]),
  countTypes: z.array(z.object({ countType: z.string(), factor2: z.number().nullable() })).default([]),
  excludedDays: z.array(dateString).default([]),
});

export type ReferenceDocument = z.infer<typeof referenceDocumentSchema>;

// ============================================================================
// Import files
// ============================================================================

const importedVehicle = z.object({
  datetime: dateTimeString,
  lane,
  class: z.number().int(),
  speed: z.number(),
});

const importedVolume = z.object({
  datetime: dateTimeString,
  lane,
  count,
});

const importedBikePed = z.object({
  datetime: dateTimeString,
  total: count,
  incount: count,
  outcount: count,
});

export const importFileSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('individual-vehicle'), records: z.array(importedVehicle) }),
  z.object({ kind: z.literal('fifteen-minute-vehicle'), records: z.array(importedVolume) }),
  z.object({ kind: z.literal('bicycle'), records: z.array(importedBikePed) }),
  z.object({ kind: z.literal('pedestrian'), records: z.array(importedBikePed) }),
]);

export type ImportFile = z.infer<typeof importFileSchema>;
