import { z } from "zod";
import { PlanType, RequestStatus } from "../common/common-enum";
import { DataFormatError } from "../common/errors";
import {
  StoredSubscriptionRequest,
  SubscriptionRequest,
} from "../types/model/subscriptionRequest.model";
import { toCompactUtcDate } from "../utils/convert";
import { readFileIfExists, writeFileAtomic } from "../utils/fileStore";
import { logger as defaultLogger, Logger } from "../utils/logger";
import { subscriptionRequestSchema, validateAgainst } from "../utils/validators";
import { WriteLock } from "../utils/writeLock";
import { CatalogStore } from "./catalogStore.service";

export interface RequestLogOptions {
  jsonPath: string;
  catalog: CatalogStore;
  now?: () => Date;
  logger?: Logger;
}

const storedRequestSchema = z.object({
  request_id: z.string(),
  timestamp: z.string(),
  gym_id: z.number().int(),
  gym_name: z.string(),
  partner_name: z.string(),
  full_name: z.string(),
  email: z.string(),
  phone: z.string(),
  preferred_plan: z.nativeEnum(PlanType),
  billing_address: z.string().nullish().transform((v) => v ?? ""),
  message: z.string().nullish().transform((v) => v ?? ""),
  user_latitude: z.number().nullish().transform((v) => v ?? null),
  user_longitude: z.number().nullish().transform((v) => v ?? null),
  user_city: z.string().nullish().transform((v) => v ?? null),
  status: z.nativeEnum(RequestStatus).default(RequestStatus.PENDING),
});

// Older logs wrap the list as { "requests": [...] }.
const requestLogFileSchema = z.union([
  z.array(storedRequestSchema),
  z
    .object({ requests: z.array(storedRequestSchema) })
    .transform((file) => file.requests),
]);

const fromStored = (stored: StoredSubscriptionRequest): SubscriptionRequest => ({
  requestId: stored.request_id,
  timestamp: stored.timestamp,
  gymId: stored.gym_id,
  gymName: stored.gym_name,
  partnerName: stored.partner_name,
  fullName: stored.full_name,
  email: stored.email,
  phone: stored.phone,
  preferredPlan: stored.preferred_plan,
  billingAddress: stored.billing_address,
  message: stored.message,
  userLatitude: stored.user_latitude,
  userLongitude: stored.user_longitude,
  userCity: stored.user_city,
  status: stored.status,
});

const toStored = (request: SubscriptionRequest): StoredSubscriptionRequest => ({
  request_id: request.requestId,
  timestamp: request.timestamp,
  gym_id: request.gymId,
  gym_name: request.gymName,
  partner_name: request.partnerName,
  full_name: request.fullName,
  email: request.email,
  phone: request.phone,
  preferred_plan: request.preferredPlan,
  billing_address: request.billingAddress,
  message: request.message,
  user_latitude: request.userLatitude,
  user_longitude: request.userLongitude,
  user_city: request.userCity,
  status: request.status,
});

/** `REQ_<UTC yyyymmdd>` */
export const requestIdPrefix = (date: Date): string => `REQ_${toCompactUtcDate(date)}`;

/**
 * Append-only log of subscription inquiries persisted as a JSON array.
 */
export class RequestLog {
  private requests: readonly SubscriptionRequest[] = [];
  private readonly lock = new WriteLock();
  private readonly jsonPath: string;
  private readonly catalog: CatalogStore;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: RequestLogOptions) {
    this.jsonPath = options.jsonPath;
    this.catalog = options.catalog;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  get size(): number {
    return this.requests.length;
  }

  async load(): Promise<number> {
    return this.lock.run(async () => {
      const text = await readFileIfExists(this.jsonPath);
      if (text === null) {
        await writeFileAtomic(this.jsonPath, "[]\n");
        this.requests = [];
        this.logger.info({ jsonPath: this.jsonPath }, "Created empty request log");
        return 0;
      }

      this.requests = this.parse(text);
      this.logger.info(
        { jsonPath: this.jsonPath, requests: this.requests.length },
        "Request log loaded"
      );
      return this.requests.length;
    });
  }

  listAll(): SubscriptionRequest[] {
    return this.requests.map((request) => ({ ...request }));
  }

  /**
   * Validates and stores a new inquiry. Unknown gyms are rejected with
   * NotFoundError before anything is written.
   */
  async append(input: unknown): Promise<SubscriptionRequest> {
    const fields = validateAgainst(subscriptionRequestSchema, input);
    const gym = this.catalog.getById(fields.gymId);

    return this.lock.run(async () => {
      const createdAt = this.now();
      const request: SubscriptionRequest = {
        requestId: this.nextRequestId(createdAt),
        timestamp: createdAt.toISOString(),
        gymId: gym.id,
        gymName: gym.gymName,
        partnerName: gym.partnerName,
        fullName: fields.fullName,
        email: fields.email,
        phone: fields.phone,
        preferredPlan: fields.preferredPlan,
        billingAddress: fields.billingAddress ?? "",
        message: fields.message ?? "",
        userLatitude: fields.userLatitude ?? null,
        userLongitude: fields.userLongitude ?? null,
        userCity: fields.userCity || null,
        status: RequestStatus.PENDING,
      };

      const next = [...this.requests, request];
      await writeFileAtomic(
        this.jsonPath,
        `${JSON.stringify(next.map(toStored), null, 2)}\n`
      );
      this.requests = next;

      this.logger.info(
        { requestId: request.requestId, gymId: request.gymId },
        "Subscription request saved"
      );
      return { ...request };
    });
  }

  private nextRequestId(createdAt: Date): string {
    const prefix = requestIdPrefix(createdAt);
    const sameDay = this.requests.filter((request) =>
      request.requestId.startsWith(`${prefix}_`)
    ).length;
    return `${prefix}_${String(sameDay + 1).padStart(3, "0")}`;
  }

  private parse(text: string): SubscriptionRequest[] {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DataFormatError(
        `Request log ${this.jsonPath} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    const parsed = requestLogFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join(", ");
      throw new DataFormatError(`Request log ${this.jsonPath} is malformed: ${issues}`);
    }
    return parsed.data.map(fromStored);
  }
}
