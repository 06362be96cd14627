import { Request, Response, NextFunction } from "express";
import { logger } from "./logger";

export type ErrorCode =
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "INSUFFICIENT_CREDIT"
  | "SIGNATURE_INVALID"
  | "PROVIDER_TIMEOUT"
  | "PROVIDER_REJECTED"
  | "PROVIDER_UNAVAILABLE"
  | "CONCURRENCY_CONFLICT"
  | "LEDGER_INVARIANT"
  | "INTERNAL";

export class ApiError extends Error {
  statusCode: number;
  data?: unknown;
  code: ErrorCode;

  constructor(message: string, statusCode = 500, data?: unknown, code: ErrorCode = "INTERNAL") {
    super(message);
    this.statusCode = statusCode;
    this.data = data;
    this.code = code;
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

/** Usage blocked: trial over and no credit left. Resolved only by a payment. */
export class InsufficientCreditError extends ApiError {
  constructor(userKey: string, creditBalanceDays: number) {
    super("Insufficient credit", 402, {
      code: "INSUFFICIENT_CREDIT",
      requiredPayment: true,
      userKey,
      creditBalanceDays,
    }, "INSUFFICIENT_CREDIT");
    this.name = "InsufficientCreditError";
    Object.setPrototypeOf(this, InsufficientCreditError.prototype);
  }
}

export class SignatureInvalidError extends ApiError {
  constructor(provider: string, reason: string) {
    super("Invalid signature", 401, { code: "SIGNATURE_INVALID", provider, reason }, "SIGNATURE_INVALID");
    this.name = "SignatureInvalidError";
    Object.setPrototypeOf(this, SignatureInvalidError.prototype);
  }
}

/** The provider call failed or hung; the payment record stays non-terminal. */
export class ProviderTimeoutError extends ApiError {
  constructor(provider: string, operation: string) {
    super(`${provider} did not respond to ${operation}`, 504, { code: "PROVIDER_TIMEOUT", provider, operation }, "PROVIDER_TIMEOUT");
    this.name = "ProviderTimeoutError";
    Object.setPrototypeOf(this, ProviderTimeoutError.prototype);
  }
}

export class ProviderRejectedError extends ApiError {
  reason: string;

  constructor(provider: string, reason: string, details?: unknown) {
    super(`${provider} rejected the request`, 502, { code: "PROVIDER_REJECTED", provider, reason, details }, "PROVIDER_REJECTED");
    this.name = "ProviderRejectedError";
    this.reason = reason;
    Object.setPrototypeOf(this, ProviderRejectedError.prototype);
  }
}

/** Optimistic write collision. Retried internally before it surfaces. */
export class ConcurrencyConflictError extends ApiError {
  constructor(collection: string, id: string) {
    super("Concurrent update, please retry", 503, { code: "CONCURRENCY_CONFLICT", collection, id }, "CONCURRENCY_CONFLICT");
    this.name = "ConcurrencyConflictError";
    Object.setPrototypeOf(this, ConcurrencyConflictError.prototype);
  }
}

/** Programming error in the ledger or reconciler. Never caught and ignored. */
export class LedgerInvariantError extends ApiError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(message, 500, { code: "LEDGER_INVARIANT", ...data }, "LEDGER_INVARIANT");
    this.name = "LedgerInvariantError";
    Object.setPrototypeOf(this, LedgerInvariantError.prototype);
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

// Express error-handling middleware
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const apiError = isApiError(err) ? err : null;
  const status = apiError?.statusCode ?? 500;
  const message = apiError?.message ?? "Internal Server Error";
  const data = apiError?.data ?? null;

  if (err instanceof LedgerInvariantError) {
    logger.fatal({ err, path: req.path }, "[ERROR] Ledger invariant violated");
  } else if (status >= 500) {
    logger.error({ err, path: req.path }, "[ERROR] Request failed");
  }

  res.status(status).json({
    responseStatus: "error",
    message,
    data,
  });
}
