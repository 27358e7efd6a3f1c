import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import { DisplayStyle, type BannerItem } from "./domain/BannerItem";
import { BannerDecodeError, InvalidInputError } from "./domain/BannerErrors";
import type { BannerDisplayConfig } from "./display/BannerDisplayConfig";
import { BannerLayoutPresenter, toLayoutResponse, type BannerTapHandler } from "./display/BannerLayout";
import type { BannerService } from "./service/BannerService";
import type { BannerUseCases } from "./service/BannerUseCases";
import type { BannerPayloadSource } from "./source/BannerPayloadSource";
import { BannerStyleQuerySchema, describeZodError } from "./validation/schemas";
import { requireAdmin } from "./middleware/auth";
import { adminRateLimiter, readRateLimiter } from "./middleware/rateLimiter";
import { auditMiddleware } from "./middleware/audit";

export const API_VERSION = "1.0.0";

export type AppDependencies = Readonly<{
  service: BannerService;
  useCases: BannerUseCases;
  displayConfig: BannerDisplayConfig;
  source: BannerPayloadSource;
  corsOrigins: readonly string[];
  onTap?: BannerTapHandler;
}>;

const logTap: BannerTapHandler = (item: BannerItem) => {
  console.log(`[Banners] Tap on ${item.id}${item.route ? ` -> ${item.route}` : ""}`);
};

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function createApp(deps: AppDependencies): express.Express {
  const { service, useCases, displayConfig, source } = deps;
  const allowedOrigins = [...deps.corsOrigins];
  const presenter = new BannerLayoutPresenter(displayConfig, deps.onTap ?? logTap);

  const app = express();

  // ---- CORS ----
  app.use(cors({
    origin(requestOrigin: string | undefined, callback: (err: Error | null, allow?: boolean | string) => void) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (allowedOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  }));

  app.use(auditMiddleware);

  // Raw payload bytes: the banner service does its own (strict UTF-8) decoding.
  const payloadBody = express.raw({ type: () => true, limit: "1mb" });

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      source: source.kind,
    });
  });

  // ===============================
  // GET /api/banners[?style=banner|list|card]
  // ===============================
  app.get("/api/banners", readRateLimiter, asyncHandler(async (req, res) => {
    const parsed = BannerStyleQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        error: `Invalid style. Must be one of: ${Object.values(DisplayStyle).join(", ")}`,
        detail: describeZodError(parsed.error),
      });
      return;
    }

    const style = parsed.data.style;
    const banners = style ? service.getBanners(style) : await useCases.getAllBanners();
    res.json({ banners, count: banners.length });
  }));

  // ===============================
  // GET /api/layout — filtered, bucketed, ordered sections
  // Kept outside /api/banners/* so every banner id stays addressable.
  // ===============================
  app.get("/api/layout", readRateLimiter, asyncHandler(async (_req, res) => {
    const sections = presenter.present(await useCases.getAllBanners());
    res.json(toLayoutResponse(sections));
  }));

  // ===============================
  // GET /api/banners/:id
  // ===============================
  app.get("/api/banners/:id", readRateLimiter, (req, res) => {
    const banner = service.getBanner(req.params.id);
    if (!banner) {
      res.status(404).json({ error: `Banner not found: ${req.params.id}` });
      return;
    }
    res.json(banner);
  });

  // ===============================
  // POST /api/banners — replace the collection from a raw JSON payload
  // ===============================
  app.post("/api/banners", adminRateLimiter, requireAdmin, payloadBody, asyncHandler(async (req, res) => {
    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.toString("utf8").trim() === "") {
      res.status(400).json({ error: "Request body must be a JSON banner payload." });
      return;
    }

    res.json(await useCases.loadAndPersist(body, source));
  }));

  // ===============================
  // POST /api/banners/refresh — reload from the payload source
  // ===============================
  app.post("/api/banners/refresh", adminRateLimiter, requireAdmin, asyncHandler(async (_req, res) => {
    const loaded = await useCases.refreshFromSource(source);
    if (loaded === undefined) {
      res.json({ loaded: 0, unchanged: true });
      return;
    }
    res.json({ loaded, unchanged: false });
  }));

  // ===============================
  // POST /api/banners/:id/tap
  // ===============================
  app.post("/api/banners/:id/tap", readRateLimiter, asyncHandler(async (req, res) => {
    presenter.present(await useCases.getAllBanners());
    const item = await presenter.tap(req.params.id);
    if (!item) {
      res.status(404).json({ error: `Banner is not displayed: ${req.params.id}` });
      return;
    }
    res.json({ id: item.id, route: item.route ?? null });
  }));

  // ---- Global error handler ----
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof BannerDecodeError) {
      console.warn("[Banners] Rejected payload:", err.message);
      res.status(422).json({ error: err.message, code: err.code, attempts: err.attempts });
      return;
    }
    if (err instanceof InvalidInputError) {
      res.status(400).json({ error: err.message, code: err.code });
      return;
    }
    console.error("[Banners Server Error]", err.message);
    res.status(500).json({ error: err.message || "Internal server error." });
  });

  return app;
}
