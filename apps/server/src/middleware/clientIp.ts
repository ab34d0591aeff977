import type { Request } from "express";

export function clientIpFromRequest(req: Request): string {
  const forwarded = req.header("x-forwarded-for");
  if (forwarded) {
    const [first] = forwarded.split(",");
    if (first && first.trim()) return first.trim();
  }
  const realIp = req.header("x-real-ip");
  if (realIp) return realIp;
  return req.socket.remoteAddress ?? "unknown";
}
