import type { Request, Response, NextFunction } from "express";
import { GraphBuildError } from "@roadnet/builder";
import { ZodError } from "zod";
import type { ErrorResponse } from "../models/responses.js";

export interface ErrorReply {
  status: number;
  body: ErrorResponse;
}

function statusOf(err: Error): number {
  // body-parser errors carry their own status (400, 413)
  if ("status" in err && typeof err.status === "number") return err.status;
  return 500;
}

/**
 * Map an error to the status and body sent back.
 *
 * @returns The reply, or undefined for values that are not errors
 */
export function toErrorReply(err: unknown): ErrorReply | undefined {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    return {
      status: 422,
      body: { message: "Validation failed", details: err.issues },
    };
  }

  if (err instanceof GraphBuildError) {
    console.warn(`[graph] ${err.name}: ${err.message}`);
    return {
      status: err.status,
      body: { message: err.message, error: err.name },
    };
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    return { status: statusOf(err), body: { message: err.message } };
  }

  return undefined;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  const reply = toErrorReply(err);
  if (reply) {
    res.status(reply.status).json(reply.body);
    return;
  }

  next(err);
}
