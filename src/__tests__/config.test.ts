import { describe, it, expect } from "vitest";
import { envSchema } from "../config.js";

describe("envSchema", () => {
  it("applies defaults for an empty environment", () => {
    expect(envSchema.parse({})).toEqual({
      GITHUB_TOKEN: undefined,
      GITHUB_ORG: "monarch-initiative",
      DISCOVERY_TOPIC: "kozahub-ingest",
      TEMPLATE_REPO: "monarch-initiative/koza-ingest-template",
      RELEASE_WORKFLOW_PATTERN: "release",
      STALENESS_THRESHOLD_DAYS: 45,
      SNAPSHOT_FILE: "data/dashboard-data.json",
      SNAPSHOT_SOURCE: undefined,
      SITE_DIR: "site",
      LOG_LEVEL: "info",
    });
  });

  it("treats a blank token as anonymous access", () => {
    expect(envSchema.parse({ GITHUB_TOKEN: "  " }).GITHUB_TOKEN).toBeUndefined();
    expect(envSchema.parse({ GITHUB_TOKEN: "test-token" }).GITHUB_TOKEN).toBe("test-token");
  });

  it("parses the staleness threshold", () => {
    expect(envSchema.parse({ STALENESS_THRESHOLD_DAYS: "30" }).STALENESS_THRESHOLD_DAYS).toBe(30);
    expect(envSchema.safeParse({ STALENESS_THRESHOLD_DAYS: "0" }).success).toBe(false);
    expect(envSchema.safeParse({ STALENESS_THRESHOLD_DAYS: "soon" }).success).toBe(false);
  });

  it("rejects malformed template repositories", () => {
    expect(envSchema.safeParse({ TEMPLATE_REPO: "no-slash" }).success).toBe(false);
  });
});
