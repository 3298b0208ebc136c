import path from "node:path";
import { resolveBackendDataFilePath } from "./runtime-paths";

export const PLATFORM_API_VERSION = "BankAnalytics-1.0.0" as const;

export const DEFAULT_PARTNER_COMPANIES = [
  "Retail Analytics Pro",
  "FinTech Insights",
  "Market Research Co",
  "Consumer Trends Lab",
] as const;

export const AVAILABLE_DATA_TYPES = [
  "category_spending",
  "average_bill",
  "spending_frequency",
  "geography",
  "age_group_stats",
] as const;

export type ConsentDataType = (typeof AVAILABLE_DATA_TYPES)[number];

export type PlatformBackendConfig = {
  port: number;
  partnerCompanies: string[];
  clientProfilesFile: string;
  trustProxy: boolean | number | string;
  jsonBodyLimit: string;
};

let cachedConfig: PlatformBackendConfig | null = null;

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const parseCsv = (value: string | undefined): string[] => {
  if (!value?.trim()) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
};

export const resolveTrustProxySetting = (value: string | undefined): boolean | number | string => {
  const raw = value?.trim();
  if (!raw) return false;

  const normalized = raw.toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;

  const numericHops = Number.parseInt(raw, 10);
  if (Number.isFinite(numericHops) && numericHops >= 0 && String(numericHops) === raw) {
    return numericHops;
  }

  return raw;
};

const resolveProfilesFile = (value: string | undefined): string => {
  const configured = value?.trim();
  if (!configured) {
    return resolveBackendDataFilePath("client-profiles.json");
  }
  return path.isAbsolute(configured) ? configured : path.resolve(process.cwd(), configured);
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): PlatformBackendConfig {
  const partners = Array.from(new Set(parseCsv(env.PARTNER_COMPANIES)));

  return {
    port: parsePositiveInt(env.PORT, 8000),
    partnerCompanies: partners.length > 0 ? partners : [...DEFAULT_PARTNER_COMPANIES],
    clientProfilesFile: resolveProfilesFile(env.CLIENT_PROFILES_FILE),
    trustProxy: resolveTrustProxySetting(env.TRUST_PROXY),
    jsonBodyLimit: env.JSON_BODY_LIMIT?.trim() || "1mb",
  };
}

export function getConfig(): PlatformBackendConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = buildConfig();
  return cachedConfig;
}
