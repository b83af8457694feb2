import { NextFunction, Request, Response } from "express";
import { CatalogStore } from "../services/catalogStore.service";
import { sendSuccess } from "../utils/response";
import { GymParams, ListGymsQuery, NearbyGymsQuery } from "../validators/gym.validator";

export class GymController {
  constructor(private readonly catalog: CatalogStore) {}

  /**
   * @route GET /api/partners
   */
  listPartners = (_req: Request, res: Response) => {
    const partners = this.catalog.listPartners();
    sendSuccess(res, `Found ${partners.length} partners`, {
      partners,
      total: partners.length,
    });
  };

  /**
   * @route GET /api/gyms
   */
  listGyms = (_req: Request, res: Response) => {
    const { partner }: ListGymsQuery = res.locals.query;
    const gyms = this.catalog.filterByPartner(partner);
    sendSuccess(res, `Found ${gyms.length} gyms`, {
      gyms,
      total: gyms.length,
      ...(partner ? { partner } : {}),
    });
  };

  /**
   * @route GET /api/gyms/nearby
   */
  searchNearby = (_req: Request, res: Response) => {
    const { lat, lon, partner, limit }: NearbyGymsQuery = res.locals.query;
    const gyms = this.catalog.findNearby({
      latitude: lat,
      longitude: lon,
      partner,
      limit,
    });
    sendSuccess(res, `Found ${gyms.length} gyms near your location`, {
      gyms,
      total: gyms.length,
      userLocation: { latitude: lat, longitude: lon },
    });
  };

  /**
   * @route GET /api/gyms/:id
   */
  getGymDetails = (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { id }: GymParams = res.locals.params;
      sendSuccess(res, "Gym details retrieved successfully", this.catalog.getDetails(id));
    } catch (error) {
      next(error);
    }
  };
}
