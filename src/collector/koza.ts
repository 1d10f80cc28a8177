import { parse as parseToml } from "smol-toml";
import { z } from "zod";

const pyprojectSchema = z.object({
  project: z
    .object({
      dependencies: z.array(z.unknown()).optional(),
    })
    .optional(),
});

const KOZA_CONSTRAINT = /koza\s*([><=!~]+)\s*([0-9.]+)/;

export const KOZA_2 = "2";

function compareVersions(a: string, b: string): number {
  const left = a.split(".").filter(Boolean).map(Number);
  const right = b.split(".").filter(Boolean).map(Number);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Reads the koza dependency from a pyproject.toml. Returns "2" when the
 * constrained version is 2.0.0 or later and null for anything else,
 * including unparseable files.
 */
export function detectKozaVersion(pyprojectToml: string): string | null {
  let data: unknown;
  try {
    data = parseToml(pyprojectToml);
  } catch {
    return null;
  }

  const result = pyprojectSchema.safeParse(data);
  if (!result.success) return null;

  const dependencies = result.data.project?.dependencies ?? [];
  const kozaDep = dependencies.find(
    (dep): dep is string =>
      typeof dep === "string" && dep.trim().startsWith("koza"),
  );
  if (!kozaDep) return null;

  const match = KOZA_CONSTRAINT.exec(kozaDep);
  if (!match) return null;

  const version = match[2];
  if (!/^\d+(\.\d+)*$/.test(version)) return null;

  return compareVersions(version, "2.0.0") >= 0 ? KOZA_2 : null;
}
