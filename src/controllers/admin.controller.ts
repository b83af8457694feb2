import { NextFunction, Request, Response } from "express";
import { DataFormatError } from "../common/errors";
import { GymCsvLoader } from "../loaders/gymCsv.loader";
import { CatalogStore } from "../services/catalogStore.service";
import { RequestLog } from "../services/requestLog.service";
import { sendSuccess } from "../utils/response";
import { GymParams } from "../validators/gym.validator";

export class AdminController {
  constructor(
    private readonly catalog: CatalogStore,
    private readonly requestLog: RequestLog,
    private readonly csvLoader: GymCsvLoader
  ) {}

  login = (_req: Request, res: Response) => {
    sendSuccess(res, "Login successful");
  };

  listGyms = (_req: Request, res: Response) => {
    const gyms = this.catalog.listAll();
    sendSuccess(res, `Found ${gyms.length} gyms`, { gyms, total: gyms.length });
  };

  addGym = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const gym = await this.catalog.addRecord(req.body);
      sendSuccess(res, "Gym added successfully", { gymId: gym.id, gym }, 201);
    } catch (error) {
      next(error);
    }
  };

  deleteGym = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { id }: GymParams = res.locals.params;
      await this.catalog.deleteById(id);
      sendSuccess(res, "Gym deleted successfully", { gymId: id });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Replaces the whole catalog with an uploaded CSV sent as a text/csv body.
   */
  uploadCsv = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== "string" || body.trim() === "") {
        throw new DataFormatError("Upload must be a non-empty CSV document");
      }

      const rows = this.csvLoader.parse(body);
      const count = await this.catalog.replaceAll(rows.map((row) => row.input));

      sendSuccess(res, `CSV uploaded successfully. ${count} gyms loaded.`, {
        gymsLoaded: count,
      });
    } catch (error) {
      next(error);
    }
  };

  listSubscriptions = (_req: Request, res: Response) => {
    const requests = this.requestLog.listAll();
    sendSuccess(res, `Found ${requests.length} subscription requests`, {
      requests,
      total: requests.length,
    });
  };
}
