import { Request, Response, NextFunction } from "express";
import { readEnv } from "../config/env";
import { query } from "../database/connection";

// Audit Logging Middleware
//
// Records every state-changing banner request once the response is sent.
// Append-only: no deletes, no updates.

export type AuditAction =
  | "banners_loaded"
  | "banners_rejected"
  | "banners_refreshed"
  | "banner_tapped";

export interface AuditEntry {
  actor?: string;
  action: AuditAction;
  resource?: string;
  status: number;
  detail?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
}

const IN_MEMORY_AUDIT_CAP = 10000;

// In-memory fallback when no database is available
const inMemoryAuditLog: AuditEntry[] = [];

export const CREATE_AUDIT_LOG_TABLE = `
  CREATE TABLE IF NOT EXISTS banner_audit_log (
    id BIGSERIAL PRIMARY KEY,
    actor TEXT,
    action TEXT NOT NULL,
    resource TEXT,
    status INTEGER NOT NULL,
    detail JSONB,
    ip_address TEXT,
    user_agent TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

let auditTableReady: Promise<unknown> | undefined;

export async function writeAuditLog(entry: AuditEntry): Promise<void> {
  if (!readEnv().DATABASE_URL) {
    inMemoryAuditLog.push(entry);
    if (inMemoryAuditLog.length > IN_MEMORY_AUDIT_CAP) {
      inMemoryAuditLog.splice(0, inMemoryAuditLog.length - IN_MEMORY_AUDIT_CAP);
    }
    return;
  }

  try {
    auditTableReady ??= query(CREATE_AUDIT_LOG_TABLE);
    await auditTableReady;
    await query(
      `INSERT INTO banner_audit_log (actor, action, resource, status, detail, ip_address, user_agent)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        entry.actor || null,
        entry.action,
        entry.resource || null,
        entry.status,
        entry.detail ? JSON.stringify(entry.detail) : null,
        entry.ipAddress || null,
        entry.userAgent || null,
      ],
    );
  } catch (err) {
    auditTableReady = undefined;
    // Audit logging must never crash the request
    console.error("[Audit] Failed to write audit log:", err);
  }
}

export function getInMemoryAuditLog(): readonly AuditEntry[] {
  return inMemoryAuditLog;
}

export function resolveAuditAction(method: string, path: string, status: number): AuditAction | undefined {
  if (method !== "POST") return undefined;

  if (/^\/api\/banners\/refresh\/?$/.test(path)) return "banners_refreshed";
  if (/^\/api\/banners\/[^/]+\/tap\/?$/.test(path)) return "banner_tapped";
  if (/^\/api\/banners\/?$/.test(path)) return status < 400 ? "banners_loaded" : "banners_rejected";

  return undefined;
}

// Middleware: logs state-changing requests after the response is written.
export function auditMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (req.method !== "POST") {
    return next();
  }

  res.on("finish", () => {
    const action = resolveAuditAction(req.method, req.path, res.statusCode);
    if (!action) return;

    const entry: AuditEntry = {
      actor: req.auth?.subject,
      action,
      resource: req.path,
      status: res.statusCode,
      detail: { method: req.method },
      ipAddress: req.ip || req.socket.remoteAddress,
      userAgent: req.headers["user-agent"],
    };

    // writeAuditLog never rejects; failures are logged inside.
    void writeAuditLog(entry);
  });

  next();
}
