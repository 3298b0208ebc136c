import type { ConsentDataType } from "../config";

export type Transaction = {
  readonly id: string;
  readonly amount: number;
  readonly category: string;
  readonly date: string;
  readonly merchant: string;
};

export type ClientProfile = {
  readonly clientId: string;
  readonly clientName: string;
  readonly ageGroup: string;
  readonly city: string;
  readonly totalBalance: number;
  readonly transactions: readonly Transaction[];
};

export type ConsentKey = {
  clientId: string;
  company: string;
};

export type ConsentGrant = ConsentKey & {
  dataTypes: ConsentDataType[];
  isActive: boolean;
  lastUpdated: string;
};

export type ConsentUpsertInput = ConsentKey & {
  dataTypes: readonly string[];
  isActive: boolean;
};

export type AggregatedDatasetKind = "category_spending" | "average_bill" | "age_group_stats";

export type CategorySpendingMetrics = {
  spendingByCategory: Record<string, number>;
  topCategory: string | null;
  totalCategories: number;
  totalSpent: number;
  activeDays: number;
};

export type AverageBillMetrics = {
  averageTransactionAmount: number;
  minAmount: number;
  maxAmount: number;
  totalTransactions: number;
  totalAmount: number;
};

export type DemographicMetrics = {
  ageGroup: string;
  city: string;
  averageBalance: number;
  clientCount: 1;
};

type AggregatedDatasetBase<K extends AggregatedDatasetKind, M> = {
  clientId: string;
  company: string;
  dataType: K;
  metrics: M;
  sampleSize: 1;
  generatedAt: string;
};

export type CategorySpendingDataset = AggregatedDatasetBase<"category_spending", CategorySpendingMetrics>;
export type AverageBillDataset = AggregatedDatasetBase<"average_bill", AverageBillMetrics>;
export type DemographicDataset = AggregatedDatasetBase<"age_group_stats", DemographicMetrics>;

export type AggregatedDataset = CategorySpendingDataset | AverageBillDataset | DemographicDataset;

export type CompanyAggregatesResult = {
  company: string;
  totalDatasets: number;
  data: AggregatedDataset[];
  message?: string;
};
