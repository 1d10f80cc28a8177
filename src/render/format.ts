const DAY_MS = 1000 * 60 * 60 * 24;

const DATE_FORMAT = new Intl.DateTimeFormat("en-US", {
  year: "numeric",
  month: "short",
  day: "numeric",
  timeZone: "UTC",
});

function parseDate(iso: string | null | undefined): Date | null {
  if (!iso) return null;
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function timeAgo(
  iso: string | null | undefined,
  now: Date = new Date(),
): string {
  const date = parseDate(iso);
  if (!date) return "Never";

  const diffDays = Math.floor((now.getTime() - date.getTime()) / DAY_MS);

  // Future timestamps (clock skew) read as today.
  if (diffDays <= 0) return "Today";
  if (diffDays === 1) return "1 day ago";
  if (diffDays < 30) return `${diffDays} days ago`;

  const diffMonths = Math.floor(diffDays / 30);
  if (diffMonths === 1) return "1 month ago";
  if (diffMonths < 12) return `${diffMonths} months ago`;

  // 360-364 days are twelve 30-day months but not yet 365 days.
  const diffYears = Math.max(1, Math.floor(diffDays / 365));
  if (diffYears === 1) return "1 year ago";
  return `${diffYears} years ago`;
}

/** "Jan 5, 2024" */
export function formatDate(iso: string | null | undefined): string {
  const date = parseDate(iso);
  if (!date) return "Never";
  return DATE_FORMAT.format(date);
}

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
