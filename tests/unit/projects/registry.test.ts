import { describe, it, expect } from "vitest";
import { ProjectRegistry } from "../../../src/projects/registry.ts";
import type { DataProject } from "../../../src/projects/types.ts";

function project(location: string, data: unknown = null): DataProject {
  return { location, data };
}

describe("ProjectRegistry", () => {
  it("looks locations up case-insensitively", () => {
    const registry = new ProjectRegistry<DataProject>();
    const a = project("Docs/A.proj");
    registry.register(a);

    expect(registry.get("docs/a.PROJ")).toBe(a);
    expect(registry.get("docs/b.proj")).toBeNull();
  });

  it("keeps insertion order in list", () => {
    const registry = new ProjectRegistry<DataProject>();
    registry.register(project("b"));
    registry.register(project("a"));
    registry.register(project("c"));

    expect(registry.list().map((p) => p.location)).toEqual(["b", "a", "c"]);
    expect(registry.size).toBe(3);
  });

  it("replaces a re-registered location in place", () => {
    const registry = new ProjectRegistry<DataProject>();
    registry.register(project("a", 1));
    registry.register(project("b", 2));
    registry.register(project("A", 3));

    expect(registry.list().map((p) => p.data)).toEqual([3, 2]);
  });

  it("removes entries and reports what was removed", () => {
    const registry = new ProjectRegistry<DataProject>();
    const a = project("a");
    registry.register(a);

    expect(registry.remove("A")).toBe(a);
    expect(registry.remove("a")).toBeNull();
    expect(registry.list()).toEqual([]);
    expect(registry.size).toBe(0);
  });

  it("contains only the exact registered instance", () => {
    const registry = new ProjectRegistry<DataProject>();
    const a = project("a");
    registry.register(a);

    expect(registry.contains(a)).toBe(true);
    expect(registry.contains(project("a"))).toBe(false);
  });

  it("hands out list snapshots", () => {
    const registry = new ProjectRegistry<DataProject>();
    registry.register(project("a"));
    const snapshot = registry.list();
    registry.register(project("b"));

    expect(snapshot).toHaveLength(1);
  });
});
