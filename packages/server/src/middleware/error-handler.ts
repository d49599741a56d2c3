import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";

function statusOf(err: Error): number {
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    res.status(422).json({
      message: "Validation failed",
      details: err.fields,
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && "body" in err) {
    console.warn(`[validation] ${err.message}`);
    res.status(400).json({ message: "Malformed JSON body" });
    return;
  }

  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) {
      console.error(`[error] ${err.message}`);
    } else {
      console.warn(`[error] ${status} ${err.message}`);
    }
    res.status(status).json({ message: err.message });
    return;
  }

  next(err);
}
