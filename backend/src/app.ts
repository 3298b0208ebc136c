import express, { type NextFunction, type Request, type Response } from "express";
import { PLATFORM_API_VERSION, type PlatformBackendConfig } from "./config";
import { emitPlatformLog } from "./logging/platform-logs";
import { createPlatformRouter } from "./routes/platform.routes";
import type { ClientProfileDirectory } from "./services/client-profiles.service";
import { ConsentStateStore } from "./services/consent-state.service";

export type PlatformApp = {
  app: express.Express;
  store: ConsentStateStore;
};

export function createPlatformApp(
  config: Pick<PlatformBackendConfig, "partnerCompanies" | "trustProxy" | "jsonBodyLimit">,
  profiles: ClientProfileDirectory,
): PlatformApp {
  const store = new ConsentStateStore({ profiles, partnerCompanies: config.partnerCompanies });

  const app = express();
  app.set("trust proxy", config.trustProxy);
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.get("/health", (_req, res) => {
    res.status(200).json({
      success: true,
      apiVersion: PLATFORM_API_VERSION,
      status: "ok",
    });
  });

  app.use(createPlatformRouter({ profiles, store }));

  // Malformed JSON bodies surface here from express.json().
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
        ? error.status
        : 500;
    const message = error instanceof Error ? error.message : "Unexpected error.";
    emitPlatformLog({
      scope: "http",
      action: "request",
      status: "error",
      clientId: null,
      company: null,
      detail: { httpStatus: status, message },
    });
    res.status(status).json({
      success: false,
      apiVersion: PLATFORM_API_VERSION,
      error: message,
    });
  });

  return { app, store };
}
