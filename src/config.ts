import { z } from "zod";

export const envSchema = z.object({
  GITHUB_TOKEN: z
    .string()
    .optional()
    .transform((s) => (s && s.trim().length > 0 ? s.trim() : undefined)),
  GITHUB_ORG: z.string().min(1, "GITHUB_ORG must not be empty").default("monarch-initiative"),
  DISCOVERY_TOPIC: z
    .string()
    .min(1, "DISCOVERY_TOPIC must not be empty")
    .default("kozahub-ingest"),
  TEMPLATE_REPO: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, "TEMPLATE_REPO must look like owner/name")
    .default("monarch-initiative/koza-ingest-template"),
  RELEASE_WORKFLOW_PATTERN: z.string().min(1).default("release"),
  STALENESS_THRESHOLD_DAYS: z
    .string()
    .default("45")
    .transform((s) => parseInt(s, 10))
    .pipe(z.number().int().min(1).max(365)),
  SNAPSHOT_FILE: z.string().default("data/dashboard-data.json"),
  SNAPSHOT_SOURCE: z.string().optional(),
  SITE_DIR: z.string().default("site"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof envSchema>;

function loadConfig(): Config {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Configuration validation failed:");
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
