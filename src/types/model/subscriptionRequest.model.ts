import { PlanType, RequestStatus } from "../../common/common-enum";

export interface SubscriptionRequestInput {
  gymId: number;
  fullName: string;
  email: string;
  phone: string;
  preferredPlan: PlanType;
  billingAddress?: string;
  message?: string;
  userLatitude?: number;
  userLongitude?: number;
  userCity?: string;
}

export interface SubscriptionRequest {
  requestId: string;
  timestamp: string;
  gymId: number;
  gymName: string;
  partnerName: string;
  fullName: string;
  email: string;
  phone: string;
  preferredPlan: PlanType;
  billingAddress: string;
  message: string;
  userLatitude: number | null;
  userLongitude: number | null;
  userCity: string | null;
  status: RequestStatus;
}

/** On-disk shape of a request log entry. */
export interface StoredSubscriptionRequest {
  request_id: string;
  timestamp: string;
  gym_id: number;
  gym_name: string;
  partner_name: string;
  full_name: string;
  email: string;
  phone: string;
  preferred_plan: PlanType;
  billing_address: string;
  message: string;
  user_latitude: number | null;
  user_longitude: number | null;
  user_city: string | null;
  status: RequestStatus;
}
