export enum PlanType {
  ONE_MONTH = "1-month",
  THREE_MONTH = "3-month",
  TWELVE_MONTH = "12-month",
}

export enum RequestStatus {
  PENDING = "pending",
}
