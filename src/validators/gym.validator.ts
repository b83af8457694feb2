import { z } from "zod";
import { loadConfig } from "../configs/environment";
import { gymCsvLoader } from "../loaders/gymCsv.loader";
import { NEARBY_DEFAULT_LIMIT } from "../utils/constants";

const config = loadConfig();

const gymId = z.coerce
  .number({ invalid_type_error: "id must be a number" })
  .int("id must be an integer")
  .positive("id must be positive");

export const gymParamsSchema = {
  params: z.object({ id: gymId }),
};

export const listGymsSchema = {
  query: z.object({
    partner: z.string().optional(),
  }),
};

// Query values arrive as strings; a blank one must not coerce to 0.
const queryNumber = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

export const nearbyGymsSchema = {
  query: z.object({
    lat: queryNumber("lat").pipe(
      z.coerce
        .number({ invalid_type_error: "lat must be a number" })
        .min(-90, "lat must be between -90 and 90")
        .max(90, "lat must be between -90 and 90")
    ),
    lon: queryNumber("lon").pipe(
      z.coerce
        .number({ invalid_type_error: "lon must be a number" })
        .min(-180, "lon must be between -180 and 180")
        .max(180, "lon must be between -180 and 180")
    ),
    partner: z.string().optional(),
    limit: queryNumber("limit")
      .pipe(
        z.coerce
          .number({ invalid_type_error: "limit must be a number" })
          .int("limit must be an integer")
          .min(1, "limit must be at least 1")
          .max(config.api.nearbyMaxLimit, `limit must be at most ${config.api.nearbyMaxLimit}`)
      )
      .optional()
      .transform((limit) => limit ?? NEARBY_DEFAULT_LIMIT),
  }),
};

// Admin forms send amenities as one comma-separated string; field rules are
// enforced by the catalog.
export const addGymSchema = {
  body: z
    .object({
      amenities: z
        .union([z.array(z.string()), z.string()])
        .optional()
        .transform((value) =>
          typeof value === "string" ? gymCsvLoader.splitAmenities(value) : value ?? []
        ),
    })
    .passthrough(),
};

export type GymParams = z.infer<typeof gymParamsSchema.params>;
export type ListGymsQuery = z.infer<typeof listGymsSchema.query>;
export type NearbyGymsQuery = z.infer<typeof nearbyGymsSchema.query>;
