import { NextFunction, Request, Response } from "express";
import { RequestLog } from "../services/requestLog.service";
import { logger } from "../utils/logger";
import { sendSuccess } from "../utils/response";

export const SUBSCRIPTION_THANK_YOU =
  "Thank you! Our wellness team will contact you within 24 hours to help you start your fitness journey.";

export class SubscriptionController {
  constructor(private readonly requestLog: RequestLog) {}

  /**
   * @route POST /api/subscription/request
   */
  submitRequest = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = await this.requestLog.append(req.body);
      logger.info(`Subscription request ${request.requestId} for gym ${request.gymId}`);

      sendSuccess(res, SUBSCRIPTION_THANK_YOU, { requestId: request.requestId }, 201);
    } catch (error) {
      next(error);
    }
  };
}
