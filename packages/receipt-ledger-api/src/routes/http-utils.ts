import {
  describeError,
  IncompleteExtractionError,
  OperationFailedError,
  ValidationError,
  type LedgerLogger,
} from "@receipt-ledger/contracts";
import type { Request, Response } from "express";
import type { ZodType } from "zod";

export function parseBody<T>(schema: ZodType<T>, req: Request, res: Response): T | null {
  return parseInput(schema, req.body, res);
}

export function parseQuery<T>(schema: ZodType<T>, req: Request, res: Response): T | null {
  return parseInput(schema, req.query, res);
}

export function parseIdParam(
  value: string | undefined,
  field: string,
  res: Response,
): number | null {
  const id = value && /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    res.status(400).json({ error: "invalid_request", message: `invalid path parameter: ${field}` });
    return null;
  }
  return id;
}

export function sendLedgerError(res: Response, error: unknown, logger: LedgerLogger): void {
  if (error instanceof IncompleteExtractionError) {
    res.status(422).json({ error: error.code, missing: error.missing });
    return;
  }

  if (error instanceof ValidationError) {
    res.status(422).json({ error: error.code, message: error.message, issues: error.issues });
    return;
  }

  if (error instanceof OperationFailedError) {
    res.status(500).json({ error: error.code, message: error.message });
    return;
  }

  logger.error(`unhandled request error: ${describeError(error)}`);
  res.status(500).json({ error: "internal_error" });
}

function parseInput<T>(schema: ZodType<T>, input: unknown, res: Response): T | null {
  const result = schema.safeParse(input);
  if (!result.success) {
    res.status(400).json({
      error: "invalid_request",
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
    return null;
  }
  return result.data;
}
