import { Request, Response, NextFunction } from "express";
import { ZodError, ZodTypeAny } from "zod";
import { sendError } from "../utils/response";

type Schemas = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

const joinIssues = (error: ZodError) =>
  error.errors.map((e) => e.message).join(", ");

/**
 * Parses the request parts named in `schemas`. The parsed body replaces
 * `req.body`; parsed query and params land on `res.locals.query` and
 * `res.locals.params` with their coerced types.
 */
export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body);
      if (!parsed.success) {
        return sendError(res, joinIssues(parsed.error), 400);
      }
      req.body = parsed.data;
    }

    if (schemas.query) {
      const parsed = schemas.query.safeParse(req.query);
      if (!parsed.success) {
        return sendError(res, joinIssues(parsed.error), 400);
      }
      res.locals.query = parsed.data;
    }

    if (schemas.params) {
      const parsed = schemas.params.safeParse(req.params);
      if (!parsed.success) {
        return sendError(res, joinIssues(parsed.error), 400);
      }
      res.locals.params = parsed.data;
    }

    return next();
  };
