import { rateLimit } from "express-rate-limit";
import { Request, Response, NextFunction } from "express";
import { AppConfig } from "../configs/environment";

export const createRateLimiter = (config: AppConfig) =>
  rateLimit({
    windowMs: config.api.rateLimit.windowMs,
    max: config.api.rateLimit.max,
    message: {
      success: false,
      error: "Too Many Requests",
      message: "Rate limit exceeded. Please try again later.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const validateContentType =
  (...types: string[]) =>
  (req: Request, res: Response, next: NextFunction): void => {
    if (req.method === "POST" || req.method === "PUT") {
      if (!req.is(types)) {
        res.status(415).json({
          success: false,
          error: "Invalid Content-Type",
          message: `Content-Type must be one of: ${types.join(", ")}`,
        });
        return;
      }
    }
    next();
  };
