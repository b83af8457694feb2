import Joi from "joi";
import { PlanType } from "../common/common-enum";
import { FieldIssue, ValidationError } from "../common/errors";
import { GymInput } from "../types/model/gym.model";
import { SubscriptionRequestInput } from "../types/model/subscriptionRequest.model";
import { CATALOG_CONSTANTS } from "./constants";

const requiredText = () => Joi.string().trim().required();

export const gymInputSchema = Joi.object<GymInput>({
  partnerName: requiredText(),
  gymName: requiredText(),
  address: requiredText(),
  pincode: Joi.string()
    .trim()
    .pattern(new RegExp(`^\\d{${CATALOG_CONSTANTS.PINCODE_LENGTH}}$`))
    .required()
    .messages({ "string.pattern.base": "pincode must be exactly 6 digits" }),
  latitude: Joi.number().min(-90).max(90).required(),
  longitude: Joi.number().min(-180).max(180).required(),
  subscriptionAmount: Joi.number().greater(0).required(),
  amenities: Joi.array().items(Joi.string().trim().min(1)).required(),
}).required();

export const subscriptionRequestSchema = Joi.object<SubscriptionRequestInput>({
  gymId: Joi.number().integer().positive().required(),
  fullName: Joi.string().trim().min(3).max(100).required(),
  email: Joi.string()
    .trim()
    .email({ tlds: { allow: false } })
    .required(),
  phone: Joi.string()
    .trim()
    .pattern(/^[6-9]\d{9}$/)
    .required()
    .messages({
      "string.pattern.base": "phone must be 10 digits starting with 6, 7, 8 or 9",
    }),
  preferredPlan: Joi.string()
    .valid(...Object.values(PlanType))
    .required(),
  billingAddress: Joi.string().trim().allow("").max(500),
  message: Joi.string().trim().allow("").max(1000),
  userLatitude: Joi.number().min(-90).max(90).allow(null),
  userLongitude: Joi.number().min(-180).max(180).allow(null),
  userCity: Joi.string().trim().allow("", null).max(100),
}).required();

const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  stripUnknown: true,
  errors: { wrap: { label: false } },
};

export type CheckResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: FieldIssue[] };

/** Validates without throwing; every violated field is reported. */
export function checkAgainst<T>(
  schema: Joi.ObjectSchema<T>,
  input: unknown,
  fieldPrefix = ""
): CheckResult<T> {
  const { error, value } = schema.validate(input, VALIDATION_OPTIONS);
  if (error) {
    return {
      ok: false,
      issues: error.details.map((detail) => ({
        field: `${fieldPrefix}${detail.path.join(".") || "value"}`,
        message: detail.message,
      })),
    };
  }
  return { ok: true, value };
}

export function validateAgainst<T>(schema: Joi.ObjectSchema<T>, input: unknown): T {
  const result = checkAgainst(schema, input);
  if (!result.ok) {
    throw new ValidationError(result.issues);
  }
  return result.value;
}
