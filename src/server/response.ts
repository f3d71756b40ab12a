export type ErrorCode = "BAD_REQUEST" | "NOT_FOUND" | "CONFIG_ERROR" | "UPSTREAM_ERROR" | "INTERNAL_ERROR";

export type SuccessBody<T> = {
  success: true;
  data?: T;
  message?: string;
  timestamp: string;
};

export type ErrorBody = {
  success: false;
  error: { code: ErrorCode; message: string; details?: unknown };
  timestamp: string;
};

export function success<T>(data?: T, message?: string): SuccessBody<T> {
  const body: SuccessBody<T> = { success: true, timestamp: new Date().toISOString() };
  if (data !== undefined) body.data = data;
  if (message !== undefined) body.message = message;
  return body;
}

export function failure(code: ErrorCode, message: string, details?: unknown): ErrorBody {
  const error: ErrorBody["error"] = { code, message };
  if (details !== undefined) error.details = details;
  return { success: false, error, timestamp: new Date().toISOString() };
}
