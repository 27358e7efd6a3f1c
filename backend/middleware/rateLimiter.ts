import rateLimit from "express-rate-limit";
import type { Request } from "express";

// Rate Limiting Middleware
//
// Two tiers:
// 1. Reads (list, lookup, layout, tap): 300 req/min per client
// 2. Admin writes (load, refresh): 20 req/min per client, rejected tokens included
//
// Key extraction: uses the admin token subject when already verified, falls back to IP.
// Admin routes mount the limiter ahead of requireAdmin, so they key by IP.

function extractKey(req: Request): string {
  if (req.auth?.subject) return `admin:${req.auth.subject}`;
  return req.ip || req.socket.remoteAddress || "unknown";
}

export const readRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Too many requests. Please try again later.", retryAfterMs: 60000 },
});

export const adminRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Banner update limit reached. Please wait before trying again.", retryAfterMs: 60000 },
});
