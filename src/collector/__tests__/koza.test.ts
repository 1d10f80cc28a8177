import { describe, it, expect } from "vitest";
import { detectKozaVersion } from "../koza.js";

function pyproject(dependencies: string[]): string {
  return [
    "[project]",
    'name = "example-ingest"',
    `dependencies = [${dependencies.map((d) => JSON.stringify(d)).join(", ")}]`,
    "",
  ].join("\n");
}

describe("detectKozaVersion", () => {
  it("reports 2 for a koza >= 2.0.0 constraint", () => {
    expect(detectKozaVersion(pyproject(["pyyaml", "koza>=2.0.0", "requests"]))).toBe("2");
  });

  it("accepts short and spaced constraints", () => {
    expect(detectKozaVersion(pyproject(["koza ~= 2.1"]))).toBe("2");
    expect(detectKozaVersion(pyproject(["koza==2"]))).toBe("2");
  });

  it("returns null for koza 1.x and older", () => {
    expect(detectKozaVersion(pyproject(["koza==0.6.1"]))).toBeNull();
    expect(detectKozaVersion(pyproject(["koza>=1.9.9"]))).toBeNull();
  });

  it("returns null when koza is unpinned or missing", () => {
    expect(detectKozaVersion(pyproject(["koza"]))).toBeNull();
    expect(detectKozaVersion(pyproject(["pyyaml"]))).toBeNull();
    expect(detectKozaVersion('[tool.poetry]\nname = "x"\n')).toBeNull();
  });

  it("returns null for invalid TOML", () => {
    expect(detectKozaVersion("[project\ndependencies = ")).toBeNull();
  });
});
