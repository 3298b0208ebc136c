import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { PLATFORM_API_VERSION } from "../config";
import { getPlatformLogs } from "../logging/platform-logs";
import type { ClientProfileDirectory } from "../services/client-profiles.service";
import type { ConsentStateStore } from "../services/consent-state.service";
import { NotFoundError, isPlatformError } from "../services/platform-errors";

export type PlatformRouterDeps = {
  profiles: ClientProfileDirectory;
  store: ConsentStateStore;
};

const consentRequestSchema = z.object({
  clientId: z.string().trim().min(1, "clientId is required."),
  company: z.string().trim().min(1, "company is required."),
  dataTypes: z.array(z.string().trim()),
  isActive: z.boolean(),
});

// Partner-facing reads pass includeLogs: false; log entries name other clients.
function success<T>(res: Response, data: T, { includeLogs = true }: { includeLogs?: boolean } = {}) {
  return res.status(200).json({
    success: true,
    apiVersion: PLATFORM_API_VERSION,
    data,
    ...(includeLogs ? { logs: getPlatformLogs(20) } : {}),
  });
}

function failure(
  res: Response,
  error: unknown,
  status = 500,
  { details, includeLogs = true }: { details?: Record<string, unknown>; includeLogs?: boolean } = {},
) {
  const message = error instanceof Error ? error.message : "Unexpected error.";
  const resolvedStatus = isPlatformError(error) ? error.httpStatus : status;
  return res.status(resolvedStatus).json({
    success: false,
    apiVersion: PLATFORM_API_VERSION,
    error: message,
    ...(isPlatformError(error) ? { code: error.code } : {}),
    ...(details ? { details } : {}),
    ...(includeLogs ? { logs: getPlatformLogs(20) } : {}),
  });
}

function readParam(req: Request, name: string): string {
  const value = req.params[name];
  return typeof value === "string" ? value.trim() : "";
}

export function createPlatformRouter({ profiles, store }: PlatformRouterDeps) {
  const router = Router();

  router.get("/clients", (_req: Request, res: Response) => success(res, profiles.listIds()));

  router.get("/companies", (_req: Request, res: Response) => success(res, store.getPartnerCompanies()));

  router.get("/data-types", (_req: Request, res: Response) => success(res, store.getDataTypes()));

  router.get("/client/:clientId", (req: Request, res: Response) => {
    const clientId = readParam(req, "clientId");
    const profile = profiles.get(clientId);
    if (!profile) {
      return failure(res, new NotFoundError(`Client not found: ${clientId}`, { clientId }), 404);
    }
    return success(res, profile);
  });

  router.get("/client/:clientId/consents", (req: Request, res: Response) => {
    return success(res, store.listForClient(readParam(req, "clientId")));
  });

  router.post("/consent", (req: Request, res: Response) => {
    const parsed = consentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return failure(res, new Error(issue?.message ?? "Invalid consent request."), 400, {
        details: { path: issue?.path.join(".") ?? "" },
      });
    }

    try {
      const consent = store.upsert(parsed.data);
      return success(res, {
        message: "Consent updated.",
        consentKey: { clientId: consent.clientId, company: consent.company },
        consent,
      });
    } catch (error) {
      return failure(res, error, 500);
    }
  });

  router.delete("/consent/:clientId/:company", (req: Request, res: Response) => {
    const clientId = readParam(req, "clientId");
    const company = readParam(req, "company");
    if (!clientId || !company) {
      return failure(res, new Error("clientId and company are required."), 400);
    }

    try {
      store.revoke({ clientId, company });
      return success(res, { message: "Consent revoked." });
    } catch (error) {
      return failure(res, error, 500);
    }
  });

  router.get("/aggregated-data/:company", (req: Request, res: Response) => {
    try {
      return success(res, store.getForCompany(readParam(req, "company")), { includeLogs: false });
    } catch (error) {
      return failure(res, error, 500, { includeLogs: false });
    }
  });

  router.get("/debug/consents", (_req: Request, res: Response) => success(res, store.listConsents()));

  router.get("/debug/aggregated", (_req: Request, res: Response) => success(res, store.listAggregates()));

  router.post("/demo-data", (_req: Request, res: Response) => {
    try {
      const consentsCreated = store.seedDemoConsents();
      return success(res, { message: "Demo consents created.", consentsCreated });
    } catch (error) {
      return failure(res, error, 500);
    }
  });

  return router;
}
