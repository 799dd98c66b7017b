import type { Response } from "express";
import { loadConfig } from "../configs/environment";
import { AppError, errorMessage } from "../types/response/error.response";

type SuccessPayload<T> = {
  success: true;
  message: string;
  data?: T;
};

type ErrorPayload = {
  success: false;
  message: string;
  error?: string;
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
  error?: string
) => {
  const payload: ErrorPayload = { success: false, message, error };
  return res.status(status).json(payload);
};

export const sendPdf = (res: Response, fileName: string, pdf: Buffer) => {
  res.setHeader("Content-Type", "application/pdf");
  res.setHeader("Content-Disposition", `attachment; filename="${fileName}"`);
  res.setHeader("Content-Length", pdf.length.toString());
  return res.status(200).send(pdf);
};

/** Map service errors to their status; anything else is a 500. */
export const sendFailure = (
  res: Response,
  fallbackMessage: string,
  error: unknown
) => {
  if (error instanceof AppError) {
    return sendError(res, error.message, error.status, error.details ?? undefined);
  }
  return sendError(
    res,
    fallbackMessage,
    500,
    loadConfig().nodeEnv === "development" ? errorMessage(error) : "Something went wrong"
  );
};
