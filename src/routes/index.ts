import express from "express";
import { AdminController } from "../controllers/admin.controller";
import { GymController } from "../controllers/gym.controller";
import { SubscriptionController } from "../controllers/subscription.controller";
import { gymCsvLoader } from "../loaders/gymCsv.loader";
import { CatalogStore } from "../services/catalogStore.service";
import { RequestLog } from "../services/requestLog.service";
import { createAdminRouter } from "./admin";
import { createGymRouter } from "./gyms";
import { createHealthRouter } from "./health";
import { createPartnerRouter } from "./partners";
import { createSubscriptionRouter } from "./subscription";

export interface RouteDependencies {
  catalog: CatalogStore;
  requestLog: RequestLog;
  adminPassword: string;
}

export const createRoutes = ({ catalog, requestLog, adminPassword }: RouteDependencies) => {
  const router = express.Router();

  const gymController = new GymController(catalog);
  const subscriptionController = new SubscriptionController(requestLog);
  const adminController = new AdminController(catalog, requestLog, gymCsvLoader);

  const healthRoute = createHealthRouter(catalog, requestLog);
  router.use("/health", healthRoute);
  router.use("/api/health", healthRoute);

  router.use("/api/partners", createPartnerRouter(gymController));
  router.use("/api/gyms", createGymRouter(gymController));
  router.use("/api/subscription", createSubscriptionRouter(subscriptionController));
  router.use("/api/admin", createAdminRouter(adminController, adminPassword));

  return router;
};
