import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { DEFAULT_PARTNER_COMPANIES, buildConfig, parseCsv, resolveTrustProxySetting } from "./config";

test("defaults apply when the environment is empty", () => {
  const config = buildConfig({});
  assert.equal(config.port, 8000);
  assert.deepEqual(config.partnerCompanies, [...DEFAULT_PARTNER_COMPANIES]);
  assert.equal(config.trustProxy, false);
  assert.equal(config.jsonBodyLimit, "1mb");
  assert.equal(path.basename(config.clientProfilesFile), "client-profiles.json");
});

test("partner companies come from a de-duplicated CSV", () => {
  const config = buildConfig({ PARTNER_COMPANIES: " Alpha Co, Beta Labs ,,Alpha Co" });
  assert.deepEqual(config.partnerCompanies, ["Alpha Co", "Beta Labs"]);
});

test("invalid ports fall back and relative profile paths resolve against cwd", () => {
  const config = buildConfig({ PORT: "-4", CLIENT_PROFILES_FILE: "fixtures/profiles.json" });
  assert.equal(config.port, 8000);
  assert.equal(config.clientProfilesFile, path.resolve(process.cwd(), "fixtures/profiles.json"));
});

test("trust proxy accepts booleans, hop counts and raw values", () => {
  assert.equal(resolveTrustProxySetting(undefined), false);
  assert.equal(resolveTrustProxySetting("TRUE"), true);
  assert.equal(resolveTrustProxySetting("2"), 2);
  assert.equal(resolveTrustProxySetting("loopback"), "loopback");
});

test("parseCsv drops blanks", () => {
  assert.deepEqual(parseCsv(" a, ,b "), ["a", "b"]);
  assert.deepEqual(parseCsv(undefined), []);
});
