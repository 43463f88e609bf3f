import { z } from "zod";

/**
 * Zod schemas for the panchang layer.
 *
 * Field names are part of the export contract: digests and run records are
 * compared across versions, so renames need a schema_version bump.
 */

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const IsoInstantSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);

export const GeoLocationSchema = z.object({
  name: z.string().optional(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  utc_offset_hours: z.number().min(-14).max(14),
});

export const CelestialPositionSchema = z.object({
  sun_longitude: z.number().min(0).lt(360),
  moon_longitude: z.number().min(0).lt(360),
  ayanamsa: z.number().min(0).lt(360),
  obliquity: z.number(),
});

const PakshaSchema = z.enum(["Shukla", "Krishna"]);

const NamedIndexSchema = (max: number) =>
  z.object({
    index: z.number().int().min(1).max(max),
    name: z.string(),
  });

const TithiSchema = NamedIndexSchema(30).extend({
  paksha: PakshaSchema,
});

export const PanchangDaySchema = z.object({
  date: IsoDateSchema,
  // 0 = Sunday, 6 = Saturday
  weekday: z.number().int().min(0).max(6),
  vaara: z.string(),
  location: GeoLocationSchema,
  sunrise: IsoInstantSchema,
  sunset: IsoInstantSchema,
  sunrise_local: z.string().regex(/^\d{2}:\d{2}$/),
  position: CelestialPositionSchema,
  tithi: TithiSchema,
  skipped_tithi: TithiSchema.nullable(),
  nakshatra: NamedIndexSchema(27),
  yoga: NamedIndexSchema(27),
  karana: NamedIndexSchema(11),
});

export type GeoLocation = z.infer<typeof GeoLocationSchema>;
export type CelestialPosition = z.infer<typeof CelestialPositionSchema>;
export type PanchangDay = z.infer<typeof PanchangDaySchema>;
export type Tithi = z.infer<typeof TithiSchema>;
