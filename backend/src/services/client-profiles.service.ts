import fs from "node:fs";
import { z } from "zod";
import type { ClientProfile } from "./platform.types";

const isoDatePattern = /^\d{4}-\d{2}-\d{2}$/;

// Date.parse rolls 2024-02-30 over to March, so the day must survive a round trip.
function isCalendarDate(value: string): boolean {
  const parsed = Date.parse(`${value}T00:00:00.000Z`);
  return Number.isFinite(parsed) && new Date(parsed).toISOString().slice(0, 10) === value;
}

const transactionSchema = z.object({
  id: z.string().trim().min(1),
  amount: z.number().finite(),
  category: z.string().trim().min(1),
  date: z
    .string()
    .regex(isoDatePattern, "date must be formatted as YYYY-MM-DD")
    .refine(isCalendarDate, "date must be a real calendar date"),
  merchant: z.string().trim().min(1),
});

const clientProfileSchema = z.object({
  clientId: z.string().trim().min(1),
  clientName: z.string().trim().min(1),
  ageGroup: z.string().trim().min(1),
  city: z.string().trim().min(1),
  totalBalance: z.number().finite(),
  transactions: z.array(transactionSchema),
});

const clientProfilesFileSchema = z.object({
  version: z.literal(1),
  profiles: z.array(clientProfileSchema),
});

export class ClientProfileDirectory {
  private readonly profilesById = new Map<string, ClientProfile>();

  constructor(profiles: readonly ClientProfile[]) {
    for (const profile of profiles) {
      if (this.profilesById.has(profile.clientId)) {
        throw new Error(`Duplicate client profile id: ${profile.clientId}`);
      }
      this.profilesById.set(profile.clientId, Object.freeze({
        ...profile,
        transactions: Object.freeze(profile.transactions.map((transaction) => Object.freeze({ ...transaction }))),
      }));
    }
  }

  has(clientId: string): boolean {
    return this.profilesById.has(clientId);
  }

  get(clientId: string): ClientProfile | undefined {
    return this.profilesById.get(clientId);
  }

  listIds(): string[] {
    return Array.from(this.profilesById.keys());
  }

  list(): ClientProfile[] {
    return Array.from(this.profilesById.values());
  }
}

export function parseClientProfiles(value: unknown): ClientProfile[] {
  const parsed = clientProfilesFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const location = issue?.path.length ? issue.path.join(".") : "root";
    throw new Error(`Invalid client profile data at ${location}: ${issue?.message ?? "unknown issue"}`);
  }
  return parsed.data.profiles;
}

export function loadClientProfiles(filePath: string): ClientProfileDirectory {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Client profile data file not found: ${filePath}`);
  }

  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unparseable JSON";
    throw new Error(`Client profile data file is not valid JSON (${filePath}): ${reason}`);
  }

  return new ClientProfileDirectory(parseClientProfiles(parsed));
}
