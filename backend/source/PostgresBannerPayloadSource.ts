import { query } from "../database/connection";
import type { WritableBannerPayloadSource } from "./BannerPayloadSource";

// =========================================================================
// PostgreSQL Payload Source
//
// Stores every accepted banner document as a new row (append-only).
// The newest row is the active payload; older rows remain for audit.
// =========================================================================

export interface PayloadRow {
  [key: string]: unknown;
  id: string;
  payload: string;
  created_at: string;
}

export type PayloadQuery = (text: string, params?: unknown[]) => Promise<{ rows: PayloadRow[] }>;

const defaultQuery: PayloadQuery = (text, params) => query<PayloadRow>(text, params);

export const CREATE_BANNER_PAYLOADS_TABLE = `
  CREATE TABLE IF NOT EXISTS banner_payloads (
    id BIGSERIAL PRIMARY KEY,
    payload TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

export class PostgresBannerPayloadSource implements WritableBannerPayloadSource {
  readonly kind = "postgres" as const;
  private schemaReady: Promise<void> | undefined;

  constructor(private readonly run: PayloadQuery = defaultQuery) {}

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.run(CREATE_BANNER_PAYLOADS_TABLE).then(
        () => undefined,
        (err: unknown) => {
          // Allow a later call to retry.
          this.schemaReady = undefined;
          throw err;
        },
      );
    }
    return this.schemaReady;
  }

  async readLatest(): Promise<string | null> {
    await this.ensureSchema();
    const result = await this.run(
      `SELECT id, payload, created_at FROM banner_payloads ORDER BY id DESC LIMIT 1`,
    );
    const row = result.rows[0];
    return row ? row.payload : null;
  }

  async save(payload: string): Promise<void> {
    await this.ensureSchema();
    await this.run(`INSERT INTO banner_payloads (payload) VALUES ($1)`, [payload]);
  }
}
