import { z } from "zod";

// Shape only; the request log applies the field rules and reports every one.
export const subscriptionRequestBodySchema = {
  body: z.record(z.unknown(), {
    invalid_type_error: "request body must be a JSON object",
  }),
};
