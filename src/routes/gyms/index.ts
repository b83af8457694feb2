import express from "express";
import { GymController } from "../../controllers/gym.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import {
  gymParamsSchema,
  listGymsSchema,
  nearbyGymsSchema,
} from "../../validators/gym.validator";

export const createGymRouter = (gymController: GymController) => {
  const router = express.Router();

  /**
   * @route GET /api/gyms
   * @desc List gyms, optionally for one partner
   * @access Public
   */
  router.get("/", validateRequest(listGymsSchema), gymController.listGyms);

  /**
   * @route GET /api/gyms/nearby
   * @desc Nearest gyms to a point, closest first
   * @access Public
   */
  router.get("/nearby", validateRequest(nearbyGymsSchema), gymController.searchNearby);

  /**
   * @route GET /api/gyms/:id
   * @desc Gym details with subscription plans
   * @access Public
   */
  router.get("/:id", validateRequest(gymParamsSchema), gymController.getGymDetails);

  return router;
};
