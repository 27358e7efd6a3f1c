import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { readEnv } from "../config/env";

// Admin Authentication Middleware
//
// Reads are public. Writes that replace the banner collection require a
// bearer token signed with JWT_SECRET and carrying role "banner-admin".
// DISABLE_AUTH=true skips the check in development.

const ADMIN_ROLE = "banner-admin";
const ACCESS_TOKEN_EXPIRY_SECONDS = 60 * 60;

export interface AuthPayload {
  subject: string;
  role: typeof ADMIN_ROLE;
  iat?: number;
  exp?: number;
}

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPayload;
    }
  }
}

const AuthPayloadSchema = z.object({
  subject: z.string().min(1),
  role: z.string(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export class ForbiddenRoleError extends Error {
  constructor(role: string) {
    super(`Role "${role}" may not modify banners.`);
    this.name = "ForbiddenRoleError";
  }
}

function getJwtSecret(): string {
  return readEnv().JWT_SECRET;
}

// --- Token generation ---

export function generateAdminToken(subject: string, expiresInSeconds: number = ACCESS_TOKEN_EXPIRY_SECONDS): string {
  if (typeof subject !== "string" || !subject.trim()) {
    throw new Error("Token subject must be a non-empty string.");
  }
  return jwt.sign({ subject: subject.trim(), role: ADMIN_ROLE }, getJwtSecret(), { expiresIn: expiresInSeconds });
}

export function verifyToken(token: string): AuthPayload {
  const decoded = jwt.verify(token, getJwtSecret());
  const parsed = AuthPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new jwt.JsonWebTokenError("Token payload is malformed.");
  }
  if (parsed.data.role !== ADMIN_ROLE) {
    throw new ForbiddenRoleError(parsed.data.role);
  }
  return { ...parsed.data, role: ADMIN_ROLE };
}

// --- Middleware ---

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  if (readEnv().DISABLE_AUTH) {
    req.auth = { subject: "dev", role: ADMIN_ROLE };
    return next();
  }

  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    res.status(401).json({ error: "Missing or invalid Authorization header. Expected: Bearer <token>" });
    return;
  }

  const token = authHeader.slice(7);

  try {
    req.auth = verifyToken(token);
    next();
  } catch (err) {
    if (err instanceof ForbiddenRoleError) {
      res.status(403).json({ error: err.message });
    } else if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ error: "Token expired." });
    } else {
      console.warn("[Auth] Rejected admin token:", err instanceof Error ? err.message : String(err));
      res.status(401).json({ error: "Invalid token." });
    }
  }
}
