/**
 * CLI: interactive REPL that drives a ProjectManager over YAML project files.
 *
 * Uses Node's readline for terminal interaction.
 */
import { createInterface } from "node:readline";
import { getSettings } from "./infra/config.ts";
import type { Settings } from "./infra/config-schema.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";
import { FixedProjectSerializerSelector, SettingsProjectInitializer } from "./projects/collaborators.ts";
import { ProjectManager } from "./projects/manager.ts";
import type { ProjectStateFlag } from "./projects/state.ts";
import type { DataProject } from "./projects/types.ts";
import { FileExistsProjectValidator } from "./projects/validation.ts";
import { YamlProjectSerializer } from "./projects/yaml-serializer.ts";

const logger = getLogger("cli");

const STATE_FLAGS: readonly ProjectStateFlag[] = [
  "isLoading",
  "isSaving",
  "isRefreshing",
  "isActivating",
  "isDeactivating",
  "isClosing",
];

export type Print = (line: string) => void;

const HELP = [
  "  Commands:",
  "    open <path>           Load a project and activate it",
  "    open-inactive <path>  Load a project without activating it",
  "    save [path]           Save the active project",
  "    close                 Close the active project",
  "    refresh               Reload the active project from disk",
  "    activate <path>       Activate a loaded project",
  "    deactivate            Clear the active project",
  "    list                  List loaded projects",
  "    state <path>          Show transition flags for a location",
  "    help                  Show this help message",
  "    quit                  Exit the REPL",
];

/** Build a manager wired with the YAML serializer and file-exists validator. */
export function createManager(settings: Settings): ProjectManager<DataProject> {
  const serializer = new YamlProjectSerializer();
  return new ProjectManager<DataProject>({
    serializerSelector: new FixedProjectSerializerSelector(serializer, serializer),
    validator: new FileExistsProjectValidator<DataProject>(),
    initializer: new SettingsProjectInitializer(settings),
    mode: settings.management.mode,
  });
}

/** Print lifecycle outcomes as they happen. */
export function attachReporter(manager: ProjectManager<DataProject>, print: Print): void {
  manager.on("loaded", (e) => print(`  loaded ${e.project.location}`));
  manager.on("loadingFailed", (e) => {
    const detail = e.validation?.hasErrors ? e.validation.toString() : (e.error?.message ?? "unknown error");
    print(`  failed to load ${e.location}: ${detail}`);
  });
  manager.on("loadingCanceled", (e) => print(`  loading of ${e.location} canceled`));
  manager.on("saved", (e) => print(`  saved ${e.project.location} to ${e.location}`));
  manager.on("savingFailed", (e) =>
    print(`  failed to save ${e.project.location}: ${e.error?.message ?? "write rejected"}`),
  );
  manager.on("closed", (e) => print(`  closed ${e.project.location}`));
  manager.on("refreshed", (e) => print(`  refreshed ${e.project.location}`));
  manager.on("refreshingFailed", (e) =>
    print(`  failed to refresh ${e.project.location}: ${e.error?.message ?? "unknown error"}`),
  );
  manager.on("activated", (e) =>
    print(e.newProject ? `  active: ${e.newProject.location}` : "  no active project"),
  );
}

/**
 * Execute one REPL line. Returns "exit" for quit, otherwise true when the
 * command was recognized.
 */
export async function executeCommand(
  manager: ProjectManager<DataProject>,
  input: string,
  print: Print,
): Promise<boolean | "exit"> {
  const [command = "", ...rest] = input.trim().split(/\s+/);
  const arg = rest.join(" ");

  switch (command.toLowerCase()) {
    case "quit":
    case "exit":
      return "exit";

    case "help":
      for (const line of HELP) print(line);
      return true;

    case "open":
      if (!arg) return usage(print, "open <path>");
      await manager.load(arg);
      return true;

    case "open-inactive":
      if (!arg) return usage(print, "open-inactive <path>");
      await manager.loadInactive(arg);
      return true;

    case "save":
      if (!(await manager.save(null, arg || undefined)) && !manager.activeProject) {
        print("  no active project to save");
      }
      return true;

    case "close":
      if (!manager.activeProject) {
        print("  no active project");
        return true;
      }
      await manager.close();
      return true;

    case "refresh":
      if (!manager.activeProject) {
        print("  no active project");
        return true;
      }
      await manager.refresh();
      return true;

    case "activate": {
      if (!arg) return usage(print, "activate <path>");
      const project = manager.getProject(arg);
      if (!project) {
        print(`  not loaded: ${arg}`);
        return true;
      }
      await manager.setActive(project);
      return true;
    }

    case "deactivate":
      await manager.setActive(null);
      return true;

    case "list": {
      const projects = manager.projects;
      if (projects.length === 0) {
        print("  no projects loaded");
        return true;
      }
      const active = manager.activeProject;
      for (const project of projects) {
        print(`  ${project === active ? "*" : " "} ${project.location}`);
      }
      return true;
    }

    case "state": {
      if (!arg) return usage(print, "state <path>");
      const state = manager.getState(arg);
      const flags = STATE_FLAGS.filter((flag) => state[flag]);
      print(`  ${state.location}: ${flags.length > 0 ? flags.join(", ") : "idle"}`);
      return true;
    }

    default:
      print(`  unknown command: ${command} (type help)`);
      return false;
  }
}

function usage(print: Print, text: string): true {
  print(`  usage: ${text}`);
  return true;
}

/** Main CLI REPL loop. */
export async function startCLI(): Promise<void> {
  const settings = getSettings();
  const manager = createManager(settings);
  const print: Print = (line) => console.log(line);

  attachReporter(manager, print);
  await manager.initialize();

  console.log("");
  console.log(`  Keystone (${settings.management.mode}-document mode)`);
  console.log("  Type help for commands, quit to exit");
  console.log("");

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("> ");

  rl.on("line", (line) => {
    if (!line.trim()) {
      rl.prompt();
      return;
    }

    executeCommand(manager, line, print)
      .then((result) => {
        if (result === "exit") {
          rl.close();
          return;
        }
        rl.prompt();
      })
      .catch((err: unknown) => {
        logger.error({ error: errorToString(err) }, "cli_error");
        print(`  [Error] ${errorToString(err)}`);
        rl.prompt();
      });
  });

  rl.prompt();
}
