import { AVAILABLE_DATA_TYPES, type ConsentDataType } from "../config";
import { emitPlatformLog } from "../logging/platform-logs";
import { aggregateForClient } from "./aggregation.service";
import type { ClientProfileDirectory } from "./client-profiles.service";
import { InvalidArgumentError, NotFoundError } from "./platform-errors";
import type {
  AggregatedDataset,
  AggregatedDatasetKind,
  CompanyAggregatesResult,
  ConsentGrant,
  ConsentKey,
  ConsentUpsertInput,
} from "./platform.types";

export type ConsentStateStoreOptions = {
  profiles: ClientProfileDirectory;
  partnerCompanies: readonly string[];
  dataTypes?: readonly ConsentDataType[];
  now?: () => Date;
};

type DemoConsent = ConsentUpsertInput;

export const DEMO_CONSENTS: readonly DemoConsent[] = [
  {
    clientId: "client_1",
    company: "Retail Analytics Pro",
    dataTypes: ["category_spending", "average_bill", "age_group_stats"],
    isActive: true,
  },
  {
    clientId: "client_2",
    company: "Retail Analytics Pro",
    dataTypes: ["category_spending", "age_group_stats"],
    isActive: true,
  },
  {
    clientId: "client_3",
    company: "FinTech Insights",
    dataTypes: ["category_spending", "average_bill"],
    isActive: true,
  },
];

/**
 * Two-level map addressed by (clientId, company). Keys are never joined into a
 * single string, so ids containing any delimiter stay distinct.
 */
class ClientCompanyMap<V> {
  private readonly byClient = new Map<string, Map<string, V>>();

  get(key: ConsentKey): V | undefined {
    return this.byClient.get(key.clientId)?.get(key.company);
  }

  set(key: ConsentKey, value: V) {
    let byCompany = this.byClient.get(key.clientId);
    if (!byCompany) {
      byCompany = new Map<string, V>();
      this.byClient.set(key.clientId, byCompany);
    }
    byCompany.set(key.company, value);
  }

  delete(key: ConsentKey): boolean {
    const byCompany = this.byClient.get(key.clientId);
    if (!byCompany) return false;
    const deleted = byCompany.delete(key.company);
    if (byCompany.size === 0) {
      this.byClient.delete(key.clientId);
    }
    return deleted;
  }

  valuesForClient(clientId: string): V[] {
    return Array.from(this.byClient.get(clientId)?.values() ?? []);
  }

  values(): V[] {
    const values: V[] = [];
    for (const byCompany of this.byClient.values()) {
      values.push(...byCompany.values());
    }
    return values;
  }
}

function cloneGrant(grant: ConsentGrant): ConsentGrant {
  return { ...grant, dataTypes: [...grant.dataTypes] };
}

export class ConsentStateStore {
  private readonly profiles: ClientProfileDirectory;
  private readonly partnerCompanies: ReadonlySet<string>;
  private readonly dataTypes: ReadonlySet<string>;
  private readonly now: () => Date;
  private readonly consents = new ClientCompanyMap<ConsentGrant>();
  private readonly aggregates = new ClientCompanyMap<Map<AggregatedDatasetKind, AggregatedDataset>>();

  constructor(options: ConsentStateStoreOptions) {
    this.profiles = options.profiles;
    this.partnerCompanies = new Set(options.partnerCompanies);
    this.dataTypes = new Set<string>(options.dataTypes ?? AVAILABLE_DATA_TYPES);
    this.now = options.now ?? (() => new Date());
  }

  getPartnerCompanies(): string[] {
    return Array.from(this.partnerCompanies);
  }

  getDataTypes(): string[] {
    return Array.from(this.dataTypes);
  }

  isPartnerCompany(company: string): boolean {
    return this.partnerCompanies.has(company);
  }

  upsert(input: ConsentUpsertInput): ConsentGrant {
    const { clientId, company, isActive } = input;
    const dataTypes = this.validateUpsert(input);

    const timestamp = this.now();
    const grant: ConsentGrant = {
      clientId,
      company,
      dataTypes,
      isActive,
      lastUpdated: timestamp.toISOString(),
    };

    const key: ConsentKey = { clientId, company };
    // Derive before writing either map.
    const datasets = isActive ? aggregateForClient(this.profiles, clientId, company, timestamp) : [];
    const byKind = new Map<AggregatedDatasetKind, AggregatedDataset>();
    for (const dataset of datasets) {
      byKind.set(dataset.dataType, dataset);
    }

    this.consents.set(key, grant);
    if (isActive) {
      this.aggregates.set(key, byKind);
      emitPlatformLog({
        scope: "aggregation",
        action: "generate_aggregates",
        status: "success",
        clientId,
        company,
        detail: { datasets: datasets.length },
      });
    } else {
      const purged = this.aggregates.delete(key);
      emitPlatformLog({
        scope: "aggregation",
        action: "purge_aggregates",
        status: purged ? "success" : "skipped",
        clientId,
        company,
        detail: { reason: "consent_inactive" },
      });
    }

    emitPlatformLog({
      scope: "consent",
      action: "upsert",
      status: "success",
      clientId,
      company,
      detail: { dataTypes, isActive },
    });

    return cloneGrant(grant);
  }

  revoke(key: ConsentKey) {
    if (!this.consents.get(key)) {
      throw new NotFoundError(`Consent not found for client ${key.clientId} and company ${key.company}`, {
        clientId: key.clientId,
        company: key.company,
      });
    }

    this.consents.delete(key);
    this.aggregates.delete(key);

    emitPlatformLog({
      scope: "consent",
      action: "revoke",
      status: "success",
      clientId: key.clientId,
      company: key.company,
    });
  }

  getConsent(key: ConsentKey): ConsentGrant | undefined {
    const grant = this.consents.get(key);
    return grant ? cloneGrant(grant) : undefined;
  }

  listForClient(clientId: string): ConsentGrant[] {
    return this.consents.valuesForClient(clientId).map(cloneGrant);
  }

  listConsents(): ConsentGrant[] {
    return this.consents.values().map(cloneGrant);
  }

  listAggregates(): AggregatedDataset[] {
    return this.aggregates.values().flatMap((byKind) => Array.from(byKind.values())).map((dataset) => structuredClone(dataset));
  }

  getForCompany(company: string): CompanyAggregatesResult {
    if (!this.isPartnerCompany(company)) {
      throw new InvalidArgumentError(`Unknown partner company: ${company}`, { company });
    }

    const data = this.listAggregates().filter((dataset) => dataset.company === company);
    return {
      company,
      totalDatasets: data.length,
      data,
      ...(data.length === 0 ? { message: "No aggregated data is available for this company yet." } : {}),
    };
  }

  seedDemoConsents(consents: readonly DemoConsent[] = DEMO_CONSENTS): number {
    for (const consent of consents) {
      this.validateUpsert(consent);
    }

    let created = 0;
    for (const consent of consents) {
      this.upsert(consent);
      created += 1;
    }

    emitPlatformLog({
      scope: "consent",
      action: "seed_demo",
      status: "success",
      clientId: null,
      company: null,
      detail: { consentsCreated: created },
    });
    return created;
  }

  private validateUpsert(input: ConsentUpsertInput): ConsentDataType[] {
    if (!this.profiles.has(input.clientId)) {
      throw new NotFoundError(`Client not found: ${input.clientId}`, { clientId: input.clientId });
    }
    if (!this.isPartnerCompany(input.company)) {
      throw new InvalidArgumentError(`Unknown partner company: ${input.company}`, { company: input.company });
    }
    return this.normalizeDataTypes(input.dataTypes);
  }

  private normalizeDataTypes(values: readonly string[]): ConsentDataType[] {
    const normalized: ConsentDataType[] = [];
    for (const value of values) {
      if (!isConsentDataType(value) || !this.dataTypes.has(value)) {
        throw new InvalidArgumentError(`Invalid data type: ${value}`, { dataType: value });
      }
      if (!normalized.includes(value)) {
        normalized.push(value);
      }
    }
    return normalized;
  }
}

export function isConsentDataType(value: string): value is ConsentDataType {
  return AVAILABLE_DATA_TYPES.some((dataType) => dataType === value);
}
