import express from "express";
import { CatalogStore } from "../../services/catalogStore.service";
import { RequestLog } from "../../services/requestLog.service";

export const createHealthRouter = (catalog: CatalogStore, requestLog: RequestLog) => {
  const healthRouter = express.Router();

  healthRouter.get("/", (_req, res) => {
    const { gyms, partners } = catalog.stats();
    res.json({
      success: true,
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || "development",
      gymsLoaded: gyms,
      partners,
      subscriptionRequests: requestLog.size,
    });
  });

  return healthRouter;
};
