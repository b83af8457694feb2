import { PlanType } from "../common/common-enum";

export const GEO_CONSTANTS = {
  EARTH_RADIUS_KM: 6371,
  DISTANCE_DECIMALS: 2,
} as const;

export const PRICING_CONSTANTS = {
  PLANS: {
    [PlanType.ONE_MONTH]: { months: 1, multiplier: 1.0, duration: "1 month" },
    [PlanType.THREE_MONTH]: { months: 3, multiplier: 0.93, duration: "3 months" },
    [PlanType.TWELVE_MONTH]: { months: 12, multiplier: 0.83, duration: "12 months" },
  },
} as const;

export const CATALOG_CONSTANTS = {
  CSV_COLUMNS: [
    "PartnerName",
    "GymName",
    "Address",
    "Pincode",
    "Latitude",
    "Longitude",
    "SubscriptionAmount",
    "Amenities",
  ],
  PINCODE_LENGTH: 6,
  AMENITY_SEPARATOR: ", ",
} as const;

export const NEARBY_DEFAULT_LIMIT = 10;
