import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";

export function attachRequestId(req: Request, res: Response, next: NextFunction) {
  const requestId = req.header("x-request-id") || randomUUID();
  res.setHeader("x-request-id", requestId);
  req.headers["x-request-id"] = requestId;
  next();
}
