import { PLATFORM_API_VERSION } from "../config";

export type PlatformLogStatus = "started" | "success" | "skipped" | "error";

export type PlatformLog = {
  scope: string;
  action: string;
  status: PlatformLogStatus;
  clientId: string | null;
  company: string | null;
  detail?: Record<string, unknown>;
  timestamp: string;
  apiVersion: typeof PLATFORM_API_VERSION;
};

const MAX_LOGS = 500;
const platformLogs: PlatformLog[] = [];
let stdoutEnabled = process.env.PLATFORM_LOG_STDOUT?.trim().toLowerCase() !== "false";

export function setPlatformLogStdout(enabled: boolean) {
  stdoutEnabled = enabled;
}

export function emitPlatformLog(log: Omit<PlatformLog, "timestamp" | "apiVersion">): PlatformLog {
  const payload: PlatformLog = {
    ...log,
    timestamp: new Date().toISOString(),
    apiVersion: PLATFORM_API_VERSION,
  };

  platformLogs.push(payload);
  if (platformLogs.length > MAX_LOGS) {
    platformLogs.shift();
  }

  if (stdoutEnabled) {
    console.log(JSON.stringify(payload));
  }
  return payload;
}

export function getPlatformLogs(limit = 100): PlatformLog[] {
  if (limit <= 0) return [];
  return platformLogs.slice(-limit);
}
