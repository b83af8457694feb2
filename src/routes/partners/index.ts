import express from "express";
import { GymController } from "../../controllers/gym.controller";

export const createPartnerRouter = (gymController: GymController) => {
  const router = express.Router();

  /**
   * @route GET /api/partners
   * @desc Partners with their gym counts
   * @access Public
   */
  router.get("/", gymController.listPartners);

  return router;
};
