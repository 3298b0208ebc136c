import assert from "node:assert/strict";
import test from "node:test";
import { setPlatformLogStdout } from "../logging/platform-logs";
import { ClientProfileDirectory } from "./client-profiles.service";
import { ConsentStateStore } from "./consent-state.service";
import { InvalidArgumentError, NotFoundError } from "./platform-errors";
import type { ClientProfile } from "./platform.types";

setPlatformLogStdout(false);

const PARTNERS = ["Retail Analytics Pro", "FinTech Insights", "Market Research Co"];

const profiles: ClientProfile[] = [
  {
    clientId: "client_1",
    clientName: "First Client",
    ageGroup: "25-35",
    city: "Alpha",
    totalBalance: 150000,
    transactions: [
      { id: "t1", amount: 2500, category: "Restaurants", date: "2024-01-15", merchant: "m1" },
      { id: "t2", amount: 5000, category: "Groceries", date: "2024-01-14", merchant: "m2" },
      { id: "t3", amount: 12000, category: "Electronics", date: "2024-01-10", merchant: "m3" },
      { id: "t4", amount: 3500, category: "Transport", date: "2024-01-08", merchant: "m4" },
      { id: "t5", amount: 8000, category: "Entertainment", date: "2024-01-05", merchant: "m5" },
    ],
  },
  {
    clientId: "client_2",
    clientName: "Second Client",
    ageGroup: "35-45",
    city: "Beta",
    totalBalance: 280000,
    transactions: [{ id: "t6", amount: 15000, category: "Clothing", date: "2024-01-16", merchant: "m6" }],
  },
  {
    clientId: "client_3",
    clientName: "Third Client",
    ageGroup: "18-25",
    city: "Gamma",
    totalBalance: 50000,
    transactions: [],
  },
];

function buildStore(nowIso = "2026-02-26T00:00:00.000Z") {
  let current = new Date(nowIso);
  const store = new ConsentStateStore({
    profiles: new ClientProfileDirectory(profiles),
    partnerCompanies: PARTNERS,
    now: () => current,
  });
  return {
    store,
    advanceTo(iso: string) {
      current = new Date(iso);
    },
  };
}

test("active upsert stores the grant and three aggregates readable by company", () => {
  const { store } = buildStore();

  const grant = store.upsert({
    clientId: "client_1",
    company: "Retail Analytics Pro",
    dataTypes: ["category_spending", "average_bill"],
    isActive: true,
  });

  assert.deepEqual(grant, {
    clientId: "client_1",
    company: "Retail Analytics Pro",
    dataTypes: ["category_spending", "average_bill"],
    isActive: true,
    lastUpdated: "2026-02-26T00:00:00.000Z",
  });

  const result = store.getForCompany("Retail Analytics Pro");
  assert.equal(result.totalDatasets, 3);
  assert.equal(result.message, undefined);

  const categories = result.data.find((dataset) => dataset.dataType === "category_spending");
  assert.ok(categories && categories.dataType === "category_spending");
  assert.equal(categories.metrics.totalSpent, 31000);
});

test("unknown client fails with NotFound and leaves no state", () => {
  const { store } = buildStore();
  assert.throws(
    () => store.upsert({ clientId: "ghost", company: "FinTech Insights", dataTypes: [], isActive: true }),
    NotFoundError,
  );
  assert.deepEqual(store.listConsents(), []);
  assert.deepEqual(store.listAggregates(), []);
});

test("unknown data type fails with InvalidArgument and does not overwrite the prior grant", () => {
  const { store } = buildStore();
  store.upsert({ clientId: "client_1", company: "FinTech Insights", dataTypes: ["geography"], isActive: true });

  assert.throws(
    () =>
      store.upsert({
        clientId: "client_1",
        company: "FinTech Insights",
        dataTypes: ["geography", "browsing_history"],
        isActive: false,
      }),
    (error: unknown) => error instanceof InvalidArgumentError && error.message === "Invalid data type: browsing_history",
  );

  assert.deepEqual(store.getConsent({ clientId: "client_1", company: "FinTech Insights" })?.dataTypes, ["geography"]);
  assert.equal(store.getForCompany("FinTech Insights").totalDatasets, 3);
});

test("granting to a company outside the partner list fails with InvalidArgument", () => {
  const { store } = buildStore();
  assert.throws(
    () => store.upsert({ clientId: "client_1", company: "Consumer Trends Lab", dataTypes: [], isActive: true }),
    InvalidArgumentError,
  );
});

test("repeat upsert replaces the grant and keeps one dataset per kind", () => {
  const { store, advanceTo } = buildStore();
  store.upsert({
    clientId: "client_1",
    company: "Market Research Co",
    dataTypes: ["category_spending", "geography"],
    isActive: true,
  });

  advanceTo("2026-02-27T08:30:00.000Z");
  store.upsert({
    clientId: "client_1",
    company: "Market Research Co",
    dataTypes: ["average_bill", "average_bill"],
    isActive: true,
  });

  const consents = store.listForClient("client_1");
  assert.equal(consents.length, 1);
  assert.deepEqual(consents[0]?.dataTypes, ["average_bill"]);
  assert.equal(consents[0]?.lastUpdated, "2026-02-27T08:30:00.000Z");

  const result = store.getForCompany("Market Research Co");
  assert.deepEqual(result.data.map((dataset) => dataset.dataType).sort(), [
    "age_group_stats",
    "average_bill",
    "category_spending",
  ]);
  assert.ok(result.data.every((dataset) => dataset.generatedAt === "2026-02-27T08:30:00.000Z"));
});

test("revoke removes the grant and only that client's aggregates", () => {
  const { store } = buildStore();
  store.upsert({ clientId: "client_1", company: "Retail Analytics Pro", dataTypes: [], isActive: true });
  store.upsert({ clientId: "client_2", company: "Retail Analytics Pro", dataTypes: [], isActive: true });

  store.revoke({ clientId: "client_1", company: "Retail Analytics Pro" });

  assert.equal(store.getConsent({ clientId: "client_1", company: "Retail Analytics Pro" }), undefined);
  const result = store.getForCompany("Retail Analytics Pro");
  assert.equal(result.totalDatasets, 3);
  assert.ok(result.data.every((dataset) => dataset.clientId === "client_2"));
});

test("revoking a missing consent fails with NotFound and deletes nothing", () => {
  const { store } = buildStore();
  store.upsert({ clientId: "client_2", company: "FinTech Insights", dataTypes: [], isActive: true });

  assert.throws(() => store.revoke({ clientId: "client_1", company: "FinTech Insights" }), NotFoundError);
  assert.equal(store.listConsents().length, 1);
  assert.equal(store.listAggregates().length, 3);
});

test("deactivating a consent keeps the grant but purges its aggregates", () => {
  const { store } = buildStore();
  store.upsert({ clientId: "client_1", company: "FinTech Insights", dataTypes: ["average_bill"], isActive: true });
  store.upsert({ clientId: "client_1", company: "FinTech Insights", dataTypes: ["average_bill"], isActive: false });

  assert.equal(store.getConsent({ clientId: "client_1", company: "FinTech Insights" })?.isActive, false);
  const result = store.getForCompany("FinTech Insights");
  assert.deepEqual(result.data, []);
  assert.equal(result.totalDatasets, 0);
  assert.equal(result.message, "No aggregated data is available for this company yet.");
});

test("ids containing separators never collide", () => {
  const directory = new ClientProfileDirectory([
    { ...profiles[2], clientId: "a_b" },
    { ...profiles[2], clientId: "a" },
  ]);
  const store = new ConsentStateStore({ profiles: directory, partnerCompanies: ["c", "b_c"] });

  store.upsert({ clientId: "a_b", company: "c", dataTypes: [], isActive: true });
  store.upsert({ clientId: "a", company: "b_c", dataTypes: [], isActive: true });
  store.revoke({ clientId: "a", company: "b_c" });

  assert.equal(store.getConsent({ clientId: "a_b", company: "c" })?.clientId, "a_b");
  assert.equal(store.getForCompany("c").totalDatasets, 3);
  assert.equal(store.getForCompany("b_c").totalDatasets, 0);
});

test("a very long transaction history aggregates and stores grant and datasets together", () => {
  const transactions = Array.from({ length: 300_000 }, (_, index) => ({
    id: `bulk-${index}`,
    amount: (index % 100) + 1,
    category: `category-${index % 7}`,
    date: "2024-02-01",
    merchant: "Bulk Merchant",
  }));
  const store = new ConsentStateStore({
    profiles: new ClientProfileDirectory([{ ...profiles[2], clientId: "bulk", transactions }]),
    partnerCompanies: ["Bulk Partner"],
  });

  store.upsert({ clientId: "bulk", company: "Bulk Partner", dataTypes: [], isActive: true });

  assert.equal(store.listConsents().length, 1);
  const result = store.getForCompany("Bulk Partner");
  assert.equal(result.totalDatasets, 3);
  const averageBill = result.data.find((dataset) => dataset.dataType === "average_bill");
  assert.ok(averageBill && averageBill.dataType === "average_bill");
  assert.equal(averageBill.metrics.minAmount, 1);
  assert.equal(averageBill.metrics.maxAmount, 100);
  assert.equal(averageBill.metrics.totalAmount, 15_150_000);
  assert.equal(averageBill.metrics.totalTransactions, 300_000);
});

test("reading an unknown company fails while a partner without grants returns empty", () => {
  const { store } = buildStore();
  assert.throws(() => store.getForCompany("Unknown Partner"), InvalidArgumentError);
  assert.deepEqual(store.getForCompany("Market Research Co").data, []);
});

test("clients without grants list an empty sequence", () => {
  const { store } = buildStore();
  assert.deepEqual(store.listForClient("client_3"), []);
  assert.deepEqual(store.listForClient("nobody"), []);
});

test("returned grants and datasets are copies", () => {
  const { store } = buildStore();
  const grant = store.upsert({ clientId: "client_2", company: "FinTech Insights", dataTypes: ["geography"], isActive: true });
  grant.dataTypes.push("average_bill");

  const [dataset] = store.getForCompany("FinTech Insights").data;
  assert.ok(dataset);
  dataset.company = "tampered";

  assert.deepEqual(store.getConsent({ clientId: "client_2", company: "FinTech Insights" })?.dataTypes, ["geography"]);
  assert.equal(store.getForCompany("FinTech Insights").totalDatasets, 3);
});

test("demo seeding installs grants for the demo partners", () => {
  const { store } = buildStore();
  assert.equal(store.seedDemoConsents(), 3);
  assert.equal(store.getForCompany("Retail Analytics Pro").totalDatasets, 6);
  assert.equal(store.getForCompany("FinTech Insights").totalDatasets, 3);
});

test("demo seeding validates every grant before writing any", () => {
  const store = new ConsentStateStore({
    profiles: new ClientProfileDirectory(profiles),
    partnerCompanies: ["Retail Analytics Pro"],
  });

  assert.throws(() => store.seedDemoConsents(), InvalidArgumentError);
  assert.deepEqual(store.listConsents(), []);
});
