import type { Request, Response } from "express";
import type { ZodType } from "zod";

export type ErrorCode =
  | "invalid_request"
  | "not_found"
  | "conflict"
  | "payload_too_large";

/**
 * Validates the JSON body (or the query string) against a contract schema.
 * On failure the 400 response is already sent and null comes back.
 */
export function parseRequest<T>(
  schema: ZodType<T>,
  req: Request,
  res: Response,
  source: "body" | "query" = "body",
): T | null {
  const result = schema.safeParse(source === "body" ? req.body : req.query);
  if (result.success) {
    return result.data;
  }

  res.status(400).json({
    error: "invalid_request",
    issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
  });
  return null;
}

export function parsePathParam(req: Request, name: string, res: Response): string | null {
  const value = req.params[name]?.trim() ?? "";
  if (value.length === 0) {
    sendError(res, 400, "invalid_request", `missing path parameter: ${name}`);
    return null;
  }
  return value;
}

export function sendError(res: Response, status: number, error: ErrorCode, message: string): void {
  res.status(status).json({ error, message });
}

export function sendNotFound(res: Response, message: string): void {
  sendError(res, 404, "not_found", message);
}
