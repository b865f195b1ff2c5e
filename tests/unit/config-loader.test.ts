/**
 * Tests for config-loader.ts
 */
import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { deepMerge, interpolateEnvVars, loadSettings } from "../../src/infra/config-loader.ts";
import { getSettings, resetSettings, setSettings, SettingsSchema } from "../../src/infra/config.ts";
import { ConfigError } from "../../src/infra/errors.ts";

describe("config-loader", () => {
  let originalCwd: string;
  let testDir: string;

  beforeEach(() => {
    originalCwd = process.cwd();
    testDir = mkdtempSync(join(tmpdir(), "keystone-config-"));
    process.chdir(testDir);
    resetSettings();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(testDir, { recursive: true, force: true });
    resetSettings();
  });

  // ── Defaults ──

  describe("defaults", () => {
    test("uses schema defaults when no config file exists", () => {
      const settings = loadSettings({});

      expect(settings.management).toEqual({ mode: "multiple", initialLocations: [] });
      expect(settings.logLevel).toBe("info");
      expect(settings.logFile).toBeUndefined();
      expect(settings.logConsoleEnabled).toBe(true);
      expect(settings.logFormat).toBe("json");
      expect(settings.nodeEnv).toBe("development");
    });
  });

  // ── Files ──

  describe("config files", () => {
    test("reads keystone.yml", () => {
      writeFileSync(
        "keystone.yml",
        "management:\n  mode: single\n  initialLocations:\n    - a.yml\nsystem:\n  logLevel: debug\n",
      );

      const settings = loadSettings({});

      expect(settings.management).toEqual({ mode: "single", initialLocations: ["a.yml"] });
      expect(settings.logLevel).toBe("debug");
    });

    test("keystone.local.yml overrides keystone.yml key by key", () => {
      writeFileSync("keystone.yml", "management:\n  mode: single\n  initialLocations: [a.yml]\n");
      writeFileSync("keystone.local.yaml", "management:\n  initialLocations: [b.yml]\n");

      const settings = loadSettings({});

      expect(settings.management).toEqual({ mode: "single", initialLocations: ["b.yml"] });
    });

    test("refuses two base config files", () => {
      writeFileSync("keystone.yml", "management: {}\n");
      writeFileSync("keystone.yaml", "management: {}\n");

      expect(() => loadSettings({})).toThrow("Multiple base config files found");
    });

    test("loads only the file named by KEYSTONE_CONFIG", () => {
      writeFileSync("keystone.yml", "management:\n  mode: single\n");
      const custom = join(testDir, "custom.yml");
      writeFileSync(custom, "system:\n  logFormat: pretty\n");

      const settings = loadSettings({ KEYSTONE_CONFIG: custom });

      expect(settings.management.mode).toBe("multiple");
      expect(settings.logFormat).toBe("pretty");
    });

    test("fails when KEYSTONE_CONFIG points nowhere", () => {
      const missing = join(testDir, "nope.yml");

      expect(() => loadSettings({ KEYSTONE_CONFIG: missing })).toThrow(`Config file not found: ${missing}`);
    });

    test("rejects invalid values with a ConfigError", () => {
      writeFileSync("keystone.yml", "management:\n  mode: triple\n");

      expect(() => loadSettings({})).toThrow(ConfigError);
      expect(() => loadSettings({})).toThrow("Invalid settings: management.mode");
    });
  });

  // ── Env ──

  describe("environment overrides", () => {
    test("env vars win over files", () => {
      writeFileSync("keystone.yml", "management:\n  mode: single\nsystem:\n  logLevel: debug\n");

      const settings = loadSettings({
        KEYSTONE_MANAGEMENT_MODE: "multiple",
        KEYSTONE_LOG_LEVEL: "error",
        KEYSTONE_LOG_CONSOLE_ENABLED: "false",
        KEYSTONE_LOG_FILE: "/var/log/keystone.log",
        NODE_ENV: "production",
      });

      expect(settings.management.mode).toBe("multiple");
      expect(settings.logLevel).toBe("error");
      expect(settings.logConsoleEnabled).toBe(false);
      expect(settings.logFile).toBe("/var/log/keystone.log");
      expect(settings.nodeEnv).toBe("production");
    });

    test("accepts initial locations as a comma-separated list", () => {
      const settings = loadSettings({ KEYSTONE_INITIAL_LOCATIONS: " a.yml, b.yml ,," });

      expect(settings.management.initialLocations).toEqual(["a.yml", "b.yml"]);
    });

    test("accepts initial locations as a JSON array", () => {
      const settings = loadSettings({ KEYSTONE_INITIAL_LOCATIONS: '["a.yml", "b,c.yml"]' });

      expect(settings.management.initialLocations).toEqual(["a.yml", "b,c.yml"]);
    });
  });

  // ── Interpolation ──

  describe("interpolateEnvVars", () => {
    test("substitutes plain variables and defaults", () => {
      expect(interpolateEnvVars("${A}-${B:-x}", { A: "1" })).toBe("1-x");
    });

    test("uses the alternate only when the variable is set", () => {
      expect(interpolateEnvVars("${FLAG:+pretty}", { FLAG: "1" })).toBe("pretty");
      expect(interpolateEnvVars("${FLAG:+pretty}", {})).toBeUndefined();
    });

    test("throws for a missing required variable", () => {
      expect(() => interpolateEnvVars("${REQ:?must be set}", {})).toThrow(
        "Environment variable REQ is required but not set: must be set",
      );
    });

    test("walks arrays and mappings", () => {
      expect(interpolateEnvVars({ list: ["${A}", 2], nested: { b: "${B:-two}" } }, { A: "one" })).toEqual({
        list: ["one", 2],
        nested: { b: "two" },
      });
    });

    test("lets schema defaults apply to interpolated files", () => {
      writeFileSync(
        "keystone.yml",
        'management:\n  initialLocations: "${LOCATIONS:-[]}"\nsystem:\n  logLevel: "${LEVEL:-warn}"\n',
      );

      const settings = loadSettings({});

      expect(settings.management.initialLocations).toEqual([]);
      expect(settings.logLevel).toBe("warn");
    });
  });

  describe("deepMerge", () => {
    test("merges nested mappings and lets the source win", () => {
      expect(deepMerge({ a: { x: 1, y: 2 }, b: [1] }, { a: { y: 3 }, b: [2], c: undefined })).toEqual({
        a: { x: 1, y: 3 },
        b: [2],
      });
    });
  });

  describe("settings singleton", () => {
    test("getSettings returns the settings set for the process", () => {
      const settings = SettingsSchema.parse({ logConsoleEnabled: false, logLevel: "silent" });
      setSettings(settings);

      expect(getSettings()).toBe(settings);
    });
  });
});
