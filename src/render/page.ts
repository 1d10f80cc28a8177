import { copyFile, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { JSDOM } from "jsdom";
import type { SnapshotLoader } from "./loader.js";
import { loadDashboard } from "./dashboard.js";
import { createLogger } from "../logger.js";

const log = createLogger("render:page");

const TEMPLATE_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

export interface StaticPageOptions {
  loader: SnapshotLoader;
  siteDir: string;
  templateDir?: string;
  now?: Date;
}

export interface StaticPageResult {
  outputPath: string;
  loaded: boolean;
}

/**
 * Renders the dashboard into the page template and writes `index.html` plus
 * its stylesheet to `siteDir`. A load failure still produces a page, showing
 * the error placeholder.
 */
export async function buildStaticPage(
  options: StaticPageOptions,
): Promise<StaticPageResult> {
  const templateDir = options.templateDir ?? TEMPLATE_DIR;
  const html = await readFile(join(templateDir, "index.html"), "utf-8");

  const outputPath = join(options.siteDir, "index.html");
  const tempPath = `${outputPath}.${process.pid}.tmp`;
  const dom = new JSDOM(html);
  let loaded = false;
  try {
    loaded = await loadDashboard(
      dom.window.document,
      options.loader,
      options.now ?? new Date(),
    );

    await mkdir(options.siteDir, { recursive: true });
    await writeFile(tempPath, dom.serialize(), "utf-8");
    await rename(tempPath, outputPath);
    await copyFile(join(templateDir, "styles.css"), join(options.siteDir, "styles.css"));
  } finally {
    dom.window.close();
    await rm(tempPath, { force: true });
  }

  log.info({ outputPath, loaded }, "Static page written");
  return { outputPath, loaded };
}
