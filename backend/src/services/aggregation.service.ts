import type {
  AggregatedDataset,
  AverageBillDataset,
  CategorySpendingDataset,
  ClientProfile,
  DemographicDataset,
  Transaction,
} from "./platform.types";
import type { ClientProfileDirectory } from "./client-profiles.service";

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function sumByCategory(transactions: readonly Transaction[]): Record<string, number> {
  const totals = new Map<string, number>();
  for (const transaction of transactions) {
    totals.set(transaction.category, (totals.get(transaction.category) ?? 0) + transaction.amount);
  }
  return Object.fromEntries(totals);
}

// Highest total wins; equal totals fall back to the smallest label in code-unit order.
export function pickTopCategory(spendingByCategory: Record<string, number>): string | null {
  let top: string | null = null;
  let topAmount = Number.NEGATIVE_INFINITY;

  for (const [category, amount] of Object.entries(spendingByCategory)) {
    if (amount > topAmount || (amount === topAmount && top !== null && category < top)) {
      top = category;
      topAmount = amount;
    }
  }

  return top;
}

function buildCategorySpending(
  profile: ClientProfile,
  company: string,
  generatedAt: string,
): CategorySpendingDataset {
  const { transactions } = profile;
  const spendingByCategory = sumByCategory(transactions);
  const totalSpent = transactions.reduce((sum, transaction) => sum + transaction.amount, 0);

  return {
    clientId: profile.clientId,
    company,
    dataType: "category_spending",
    metrics: {
      spendingByCategory,
      topCategory: pickTopCategory(spendingByCategory),
      totalCategories: Object.keys(spendingByCategory).length,
      totalSpent,
      activeDays: new Set(transactions.map((transaction) => transaction.date)).size,
    },
    sampleSize: 1,
    generatedAt,
  };
}

function buildAverageBill(profile: ClientProfile, company: string, generatedAt: string): AverageBillDataset {
  const amounts = profile.transactions.map((transaction) => transaction.amount);
  const hasTransactions = amounts.length > 0;
  let totalAmount = 0;
  let minAmount = Number.POSITIVE_INFINITY;
  let maxAmount = Number.NEGATIVE_INFINITY;
  for (const amount of amounts) {
    totalAmount += amount;
    if (amount < minAmount) minAmount = amount;
    if (amount > maxAmount) maxAmount = amount;
  }

  return {
    clientId: profile.clientId,
    company,
    dataType: "average_bill",
    metrics: {
      averageTransactionAmount: hasTransactions ? roundToCents(totalAmount / amounts.length) : 0,
      minAmount: hasTransactions ? minAmount : 0,
      maxAmount: hasTransactions ? maxAmount : 0,
      totalTransactions: amounts.length,
      totalAmount,
    },
    sampleSize: 1,
    generatedAt,
  };
}

function buildDemographics(profile: ClientProfile, company: string, generatedAt: string): DemographicDataset {
  return {
    clientId: profile.clientId,
    company,
    dataType: "age_group_stats",
    metrics: {
      ageGroup: profile.ageGroup,
      city: profile.city,
      averageBalance: profile.totalBalance,
      clientCount: 1,
    },
    sampleSize: 1,
    generatedAt,
  };
}

/**
 * Derives the three per-consent datasets from a single client profile.
 * Every dataset shares one generation timestamp.
 */
export function aggregateClientProfile(
  profile: ClientProfile,
  company: string,
  generatedAt: Date = new Date(),
): [CategorySpendingDataset, AverageBillDataset, DemographicDataset] {
  const timestamp = generatedAt.toISOString();
  return [
    buildCategorySpending(profile, company, timestamp),
    buildAverageBill(profile, company, timestamp),
    buildDemographics(profile, company, timestamp),
  ];
}

export function aggregateForClient(
  directory: ClientProfileDirectory,
  clientId: string,
  company: string,
  generatedAt: Date = new Date(),
): AggregatedDataset[] {
  const profile = directory.get(clientId);
  if (!profile) return [];
  return aggregateClientProfile(profile, company, generatedAt);
}
