import { z } from "zod";

export const STATUS_VALUES = ["healthy", "stale", "failed"] as const;

export const healthStatusSchema = z.enum(STATUS_VALUES);

export const releaseSchema = z.object({
  tag: z.string(),
  url: z.string(),
  date: z.string(),
});

export const workflowRunSchema = z.object({
  url: z.string(),
  conclusion: z.string().nullable(),
  date: z.string(),
});

export const templateStatusSchema = z.object({
  commit: z.string(),
  commits_behind: z.number().int().nonnegative().nullable(),
});

export const ingestSchema = z.object({
  name: z.string().min(1),
  repo_url: z.string(),
  koza_version: z.string().nullish(),
  last_release: releaseSchema.nullish(),
  last_workflow_run: workflowRunSchema.nullish(),
  template_status: templateStatusSchema.nullish(),
  status: healthStatusSchema,
});

export const templateInfoSchema = z.object({
  repo_url: z.string(),
  latest_commit: z.string(),
  total_commits: z.number().int().nonnegative(),
});

export const snapshotSchema = z
  .object({
    last_updated: z.string(),
    template: templateInfoSchema.nullish(),
    ingests: z.array(ingestSchema),
  })
  .refine(
    (s) => new Set(s.ingests.map((i) => i.name)).size === s.ingests.length,
    { message: "Ingest names must be unique", path: ["ingests"] },
  );

export type HealthStatus = z.infer<typeof healthStatusSchema>;
export type Release = z.infer<typeof releaseSchema>;
export type WorkflowRun = z.infer<typeof workflowRunSchema>;
export type TemplateStatus = z.infer<typeof templateStatusSchema>;
export type TemplateInfo = z.infer<typeof templateInfoSchema>;
export type Ingest = z.infer<typeof ingestSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;
