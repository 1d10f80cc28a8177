#!/usr/bin/env node
import { config } from "./config.js";
import { createLogger } from "./logger.js";
import { createGitHubClient } from "./github/client.js";
import { createGitHubProvider } from "./github/provider.js";
import { SnapshotStore } from "./snapshot/store.js";
import { runCollection } from "./collector/collect.js";
import { createSnapshotLoader } from "./render/loader.js";
import { buildStaticPage } from "./render/page.js";

const log = createLogger("main");

const COMMANDS = ["collect", "render"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function collectCommand(): Promise<void> {
  const github = createGitHubClient(config.GITHUB_TOKEN);
  const provider = createGitHubProvider(github, {
    workflowPattern: config.RELEASE_WORKFLOW_PATTERN,
  });
  const store = new SnapshotStore(config.SNAPSHOT_FILE, createLogger("snapshot"));

  await runCollection(provider, store, {
    org: config.GITHUB_ORG,
    topic: config.DISCOVERY_TOPIC,
    templateRepo: config.TEMPLATE_REPO,
    thresholdDays: config.STALENESS_THRESHOLD_DAYS,
  });
}

async function renderCommand(): Promise<void> {
  const source = config.SNAPSHOT_SOURCE ?? config.SNAPSHOT_FILE;
  const { loaded } = await buildStaticPage({
    loader: createSnapshotLoader(source),
    siteDir: config.SITE_DIR,
  });
  if (!loaded) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const command = process.argv[2];
  if (!isCommand(command)) {
    console.error(`Usage: ingest-dashboard <${COMMANDS.join("|")}>`);
    process.exitCode = 1;
    return;
  }

  log.info({ command }, "Ingest dashboard starting");
  if (command === "collect") {
    await collectCommand();
  } else {
    await renderCommand();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, "Run failed");
  process.exit(1);
});
