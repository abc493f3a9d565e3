import type { Outcome } from "@studydesk/types";
import { AppError, errorMessage } from "./app-error.js";

export function succeed<T>(data: T): Outcome<T, AppError> {
  return { success: true, data };
}

export function fail<T = never>(error: AppError): Outcome<T, AppError> {
  return { success: false, error };
}

/**
 * Pass AppErrors through; wrap anything else with `wrap`.
 */
export function toAppError(err: unknown, wrap: (message: string, cause: unknown) => AppError): AppError {
  if (AppError.isAppError(err)) return err;
  return wrap(errorMessage(err), err);
}
