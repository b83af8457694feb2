import { Response } from "express";
import { FieldIssue } from "../common/errors";

type SuccessPayload<T> = {
  success: true;
  message: string;
  data?: T;
};

type ErrorPayload = {
  success: false;
  message: string;
  error?: string;
  errors?: FieldIssue[];
};

export const sendSuccess = <T>(
  res: Response,
  message: string,
  data?: T,
  status = 200
) => {
  const payload: SuccessPayload<T> = { success: true, message, data };
  return res.status(status).json(payload);
};

export const sendError = (
  res: Response,
  message: string,
  status = 400,
  error?: string,
  errors?: FieldIssue[]
) => {
  const payload: ErrorPayload = { success: false, message, error, errors };
  return res.status(status).json(payload);
};
