import express from "express";
import { SubscriptionController } from "../../controllers/subscription.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { subscriptionRequestBodySchema } from "../../validators/subscription.validator";

export const createSubscriptionRouter = (subscriptionController: SubscriptionController) => {
  const router = express.Router();

  /**
   * @route POST /api/subscription/request
   * @desc Submit a subscription inquiry for a gym
   * @access Public
   */
  router.post(
    "/request",
    validateContentType("application/json"),
    validateRequest(subscriptionRequestBodySchema),
    subscriptionController.submitRequest
  );

  return router;
};
