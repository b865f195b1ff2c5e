import { describe, expect, test } from "vitest";
import { attachReporter, executeCommand } from "../../src/cli.ts";
import { MemorySerializer, createManager } from "../helpers/fakes.ts";

function setup(files: Record<string, unknown> = { "a.proj": 1, "b.proj": 2 }) {
  const manager = createManager(new MemorySerializer(files));
  const lines: string[] = [];
  const print = (line: string): void => {
    lines.push(line);
  };
  attachReporter(manager, print);
  return { manager, lines, print };
}

describe("executeCommand", () => {
  test("open loads and activates", async () => {
    const { manager, lines, print } = setup();

    expect(await executeCommand(manager, "open a.proj", print)).toBe(true);
    expect(lines).toEqual(["  loaded a.proj", "  active: a.proj"]);
  });

  test("list marks the active project", async () => {
    const { manager, lines, print } = setup();
    await executeCommand(manager, "open a.proj", print);
    await executeCommand(manager, "open-inactive b.proj", print);
    lines.length = 0;

    await executeCommand(manager, "list", print);

    expect(lines).toEqual(["  * a.proj", "    b.proj"]);
  });

  test("activate switches to a loaded project", async () => {
    const { manager, lines, print } = setup();
    await executeCommand(manager, "open a.proj", print);
    await executeCommand(manager, "open-inactive b.proj", print);
    lines.length = 0;

    await executeCommand(manager, "activate B.PROJ", print);
    await executeCommand(manager, "activate c.proj", print);

    expect(lines).toEqual(["  active: b.proj", "  not loaded: c.proj"]);
  });

  test("save, refresh and close act on the active project", async () => {
    const { manager, lines, print } = setup();
    await executeCommand(manager, "open a.proj", print);
    lines.length = 0;

    await executeCommand(manager, "save copy.proj", print);
    await executeCommand(manager, "refresh", print);
    await executeCommand(manager, "close", print);

    expect(lines).toEqual([
      "  saved a.proj to copy.proj",
      "  no active project",
      "  refreshed a.proj",
      "  active: a.proj",
      "  no active project",
      "  closed a.proj",
    ]);
  });

  test("reports commands that need an active project", async () => {
    const { manager, lines, print } = setup();

    await executeCommand(manager, "save", print);
    await executeCommand(manager, "close", print);
    await executeCommand(manager, "refresh", print);

    expect(lines).toEqual(["  no active project to save", "  no active project", "  no active project"]);
  });

  test("state shows the flags set during a transition", async () => {
    const { manager, lines, print } = setup();
    await executeCommand(manager, "open a.proj", print);
    const during: string[] = [];
    manager.on("saving", async () => {
      await executeCommand(manager, "state a.proj", (line) => {
        during.push(line);
      });
    });
    lines.length = 0;

    await executeCommand(manager, "save", print);
    await executeCommand(manager, "state a.proj", print);

    expect(during).toEqual(["  a.proj: isSaving"]);
    expect(lines).toEqual(["  saved a.proj to a.proj", "  a.proj: idle"]);
  });

  test("reports load failures", async () => {
    const { manager, lines, print } = setup({});

    await executeCommand(manager, "open missing.proj", print);

    expect(lines).toEqual(["  failed to load missing.proj: Project could not be loaded from 'missing.proj'"]);
  });

  test("prints usage for missing arguments", async () => {
    const { manager, lines, print } = setup();

    await executeCommand(manager, "open", print);
    await executeCommand(manager, "state", print);

    expect(lines).toEqual(["  usage: open <path>", "  usage: state <path>"]);
  });

  test("quit exits and unknown commands are reported", async () => {
    const { manager, lines, print } = setup();

    expect(await executeCommand(manager, "QUIT", print)).toBe("exit");
    expect(await executeCommand(manager, "frobnicate now", print)).toBe(false);
    expect(lines).toEqual(["  unknown command: frobnicate (type help)"]);
  });
});
