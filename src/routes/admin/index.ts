import express from "express";
import { AdminController } from "../../controllers/admin.controller";
import { requireAdmin } from "../../middlewares/adminAuth.middleware";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { addGymSchema, gymParamsSchema } from "../../validators/gym.validator";

const CSV_TYPES = ["text/csv", "application/csv", "text/plain"];

export const createAdminRouter = (adminController: AdminController, adminPassword: string) => {
  const router = express.Router();

  router.use(express.text({ type: CSV_TYPES, limit: "5mb" }));
  router.use(requireAdmin(adminPassword));

  router.post("/login", adminController.login);

  router.get("/gyms", adminController.listGyms);

  router.post(
    ["/gyms", "/gyms/add"],
    validateContentType("application/json"),
    validateRequest(addGymSchema),
    adminController.addGym
  );

  router.delete("/gyms/:id", validateRequest(gymParamsSchema), adminController.deleteGym);

  router.post(
    "/gyms/upload-csv",
    validateContentType(...CSV_TYPES),
    adminController.uploadCsv
  );

  router.get("/subscriptions", adminController.listSubscriptions);

  return router;
};
