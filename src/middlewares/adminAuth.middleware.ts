import { createHash, timingSafeEqual } from "crypto";
import { Request, Response, NextFunction } from "express";
import { UnauthorizedError } from "../common/errors";

const digest = (value: string) => createHash("sha256").update(value).digest();

const firstString = (value: unknown): string | undefined => {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
};

/** Header first, then `?password=`, then a `password` body field. */
export const extractAdminPassword = (req: Request): string | undefined => {
  const body: unknown = req.body;
  const fromBody =
    typeof body === "object" && body !== null && "password" in body
      ? firstString(body.password)
      : undefined;

  return (
    firstString(req.headers["x-admin-password"]) ??
    firstString(req.query.password) ??
    fromBody
  );
};

/**
 * Capability gate for the admin routes. An empty configured password
 * disables admin access altogether.
 */
export const requireAdmin =
  (adminPassword: string) => (req: Request, _res: Response, next: NextFunction) => {
    const candidate = extractAdminPassword(req);
    if (
      !adminPassword ||
      candidate === undefined ||
      !timingSafeEqual(digest(candidate), digest(adminPassword))
    ) {
      return next(new UnauthorizedError());
    }
    return next();
  };
