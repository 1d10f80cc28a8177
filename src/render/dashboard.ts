import type { Ingest, Snapshot } from "../snapshot/schema.js";
import type { SnapshotLoader } from "./loader.js";
import { capitalize, formatDate, timeAgo } from "./format.js";
import { sortIngests, summarize } from "./summary.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("render");

export const LOAD_ERROR_MESSAGE =
  "Error loading dashboard data. Please try refreshing the page.";

export const ELEMENT_IDS = {
  lastUpdated: "last-updated",
  summary: "summary",
  template: "template-info",
  dashboard: "dashboard",
} as const;

function hostElement(doc: Document, id: string): HTMLElement {
  const existing = doc.getElementById(id);
  if (existing) return existing;
  const created = doc.createElement("div");
  created.id = id;
  doc.body.appendChild(created);
  return created;
}

function el<K extends keyof HTMLElementTagNameMap>(
  doc: Document,
  tag: K,
  className?: string,
  text?: string,
): HTMLElementTagNameMap[K] {
  const node = doc.createElement(tag);
  if (className) node.className = className;
  if (text !== undefined) node.textContent = text;
  return node;
}

function link(doc: Document, href: string, text: string): HTMLAnchorElement {
  const a = el(doc, "a", undefined, text);
  a.href = href;
  a.target = "_blank";
  a.rel = "noopener";
  return a;
}

function detailRow(doc: Document, label: string, value: HTMLElement): HTMLElement {
  const row = el(doc, "div", "detail-row");
  row.appendChild(el(doc, "div", "detail-label", label));
  row.appendChild(value);
  return row;
}

function placeholder(doc: Document, text: string): HTMLElement {
  return el(doc, "span", "placeholder", text);
}

export function describeTemplateStatus(
  commit: string,
  behind: number | null,
): string {
  if (behind === null) return `Unknown commit ${commit}`;
  if (behind === 0) return "Up to date";
  if (behind === 1) return "1 commit behind";
  return `${behind} commits behind`;
}

export function createIngestCard(
  doc: Document,
  ingest: Ingest,
  now: Date = new Date(),
): HTMLElement {
  const card = el(doc, "div", `ingest-card ${ingest.status}`);
  card.dataset.name = ingest.name;

  const badge = el(doc, "div", `status-badge ${ingest.status}`);
  badge.title = capitalize(ingest.status);

  const name = el(doc, "div", "ingest-name");
  name.appendChild(link(doc, ingest.repo_url, ingest.name));
  if (ingest.koza_version === "2") {
    name.appendChild(el(doc, "span", "version-badge", "koza 2"));
  }

  const details = el(doc, "div", "ingest-details");

  const releaseValue = el(doc, "div", "detail-value");
  if (ingest.last_release) {
    releaseValue.appendChild(link(doc, ingest.last_release.url, ingest.last_release.tag));
    releaseValue.appendChild(
      el(doc, "span", "time-ago", timeAgo(ingest.last_release.date, now)),
    );
  } else {
    releaseValue.appendChild(placeholder(doc, "No releases"));
  }
  details.appendChild(detailRow(doc, "Latest Release", releaseValue));

  const workflowValue = el(doc, "div", "detail-value");
  if (ingest.last_workflow_run) {
    const run = ingest.last_workflow_run;
    const conclusion = run.conclusion ?? "unknown";
    workflowValue.appendChild(link(doc, run.url, "View run"));
    workflowValue.appendChild(el(doc, "span", `conclusion-badge ${conclusion}`, conclusion));
    workflowValue.appendChild(el(doc, "span", "time-ago", timeAgo(run.date, now)));
  } else {
    workflowValue.appendChild(placeholder(doc, "No workflow runs"));
  }
  details.appendChild(detailRow(doc, "Last Workflow Run", workflowValue));

  if (ingest.template_status) {
    const { commit, commits_behind } = ingest.template_status;
    const templateValue = el(
      doc,
      "div",
      "detail-value",
      describeTemplateStatus(commit, commits_behind),
    );
    details.appendChild(detailRow(doc, "Template", templateValue));
  }

  card.appendChild(badge);
  card.appendChild(name);
  card.appendChild(details);
  return card;
}

/**
 * Fills the host page from a snapshot. Every node is built before anything
 * is attached.
 */
export function renderDashboard(
  doc: Document,
  snapshot: Snapshot,
  now: Date = new Date(),
): void {
  const counts = summarize(snapshot.ingests);
  const cards = sortIngests(snapshot.ingests).map((ingest) =>
    createIngestCard(doc, ingest, now),
  );

  const summaryNodes = (["healthy", "stale", "failed"] as const).map((status) =>
    el(doc, "span", status, `${counts[status]} ${status}`),
  );

  const templateNodes: Node[] = [];
  if (snapshot.template) {
    templateNodes.push(doc.createTextNode("Template: "));
    templateNodes.push(
      link(doc, snapshot.template.repo_url, snapshot.template.latest_commit),
    );
    templateNodes.push(
      doc.createTextNode(` (${snapshot.template.total_commits} commits)`),
    );
  }

  hostElement(doc, ELEMENT_IDS.lastUpdated).textContent =
    `Last updated: ${formatDate(snapshot.last_updated)} (${timeAgo(snapshot.last_updated, now)})`;
  hostElement(doc, ELEMENT_IDS.summary).replaceChildren(...summaryNodes);
  hostElement(doc, ELEMENT_IDS.template).replaceChildren(...templateNodes);
  hostElement(doc, ELEMENT_IDS.dashboard).replaceChildren(...cards);

  log.debug({ ingests: cards.length, ...counts }, "Dashboard rendered");
}

export function renderLoadError(doc: Document): void {
  hostElement(doc, ELEMENT_IDS.lastUpdated).replaceChildren();
  hostElement(doc, ELEMENT_IDS.summary).replaceChildren();
  hostElement(doc, ELEMENT_IDS.template).replaceChildren();
  hostElement(doc, ELEMENT_IDS.dashboard).replaceChildren(
    el(doc, "div", "loading error", LOAD_ERROR_MESSAGE),
  );
}

/**
 * Loads the snapshot and renders it. Any failure ends in the single error
 * placeholder; the returned promise never rejects.
 */
export async function loadDashboard(
  doc: Document,
  loader: SnapshotLoader,
  now: Date = new Date(),
): Promise<boolean> {
  try {
    const snapshot = await loader();
    renderDashboard(doc, snapshot, now);
    return true;
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Error loading dashboard data");
    renderLoadError(doc);
    return false;
  }
}
