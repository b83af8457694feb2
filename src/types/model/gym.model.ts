import { PricingPlans } from "./pricingPlan.model";

export interface GymInput {
  partnerName: string;
  gymName: string;
  address: string;
  pincode: string;
  latitude: number;
  longitude: number;
  subscriptionAmount: number;
  amenities: string[];
}

export interface GymRecord extends GymInput {
  id: number;
}

export interface NearbyGym extends GymRecord {
  /** Kilometres from the query point, rounded to 2 decimals. */
  distance: number;
}

export interface GymDetails extends GymRecord {
  subscriptionPlans: PricingPlans;
}

export interface PartnerSummary {
  name: string;
  count: number;
}

export interface NearbySearchParams {
  latitude: number;
  longitude: number;
  partner?: string;
  limit: number;
}
