// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromObject,
  configFromFile,
  partialConfigFromObject,
  createSequenceConfig,
  mergeConfigs,
  loadConfig,
  validateConfig,
  DEFAULT_SEQUENCE_CONFIG,
} from "../../../src/core/config/config";
import { Sequence } from "../../../src/core/seq";

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.MEMOSEQ_LOGGING;
    delete process.env.MEMOSEQ_MAX_EVENTS;
    delete process.env.MEMOSEQ_CHECK_VIEWS;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_SEQUENCE_CONFIG);
  });

  it("reads logging flags", () => {
    process.env.MEMOSEQ_LOGGING = "true";
    expect(configFromEnv().logging).toBe(true);

    process.env.MEMOSEQ_LOGGING = "0";
    expect(configFromEnv().logging).toBe(false);

    process.env.MEMOSEQ_LOGGING = "maybe";
    expect(configFromEnv().logging).toBe(DEFAULT_SEQUENCE_CONFIG.logging);
  });

  it("reads limits and view checks", () => {
    process.env.MEMOSEQ_MAX_EVENTS = "500";
    process.env.MEMOSEQ_CHECK_VIEWS = "off";
    const config = configFromEnv();
    expect(config.maxEvents).toBe(500);
    expect(config.checkViews).toBe(false);
  });

  it("falls back on unparseable numbers", () => {
    process.env.MEMOSEQ_MAX_EVENTS = "lots";
    expect(configFromEnv().maxEvents).toBe(DEFAULT_SEQUENCE_CONFIG.maxEvents);
  });

  it("honours a custom prefix", () => {
    process.env.SEQ_LOGGING = "yes";
    expect(configFromEnv("SEQ").logging).toBe(true);
    expect(configFromEnv().logging).toBe(false);
  });
});

describe("configFromObject", () => {
  it("parses camelCase keys", () => {
    expect(configFromObject({ logging: true, maxEvents: 50, checkViews: false })).toEqual({
      logging: true,
      maxEvents: 50,
      checkViews: false,
    });
  });

  it("parses snake_case keys", () => {
    const config = configFromObject({ max_events: 75, check_views: false });
    expect(config.maxEvents).toBe(75);
    expect(config.checkViews).toBe(false);
    expect(config.logging).toBe(false);
  });

  it("ignores wrongly typed values", () => {
    expect(configFromObject({ logging: "yes", maxEvents: "10" })).toEqual(DEFAULT_SEQUENCE_CONFIG);
  });

  it("keeps only present keys in the partial form", () => {
    expect(partialConfigFromObject({ logging: true })).toEqual({ logging: true });
    expect(partialConfigFromObject({})).toEqual({});
  });
});

describe("mergeConfigs", () => {
  it("later configs override earlier ones", () => {
    expect(mergeConfigs({ logging: true, maxEvents: 9 }, { maxEvents: 5 })).toEqual({
      logging: true,
      maxEvents: 5,
      checkViews: true,
    });
  });

  it("returns defaults with no input", () => {
    expect(mergeConfigs()).toEqual(DEFAULT_SEQUENCE_CONFIG);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_SEQUENCE_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects a non-positive event cap", () => {
    const result = validateConfig(createSequenceConfig({ maxEvents: 0 }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["maxEvents must be a positive integer"]);
  });

  it("warns about risky settings", () => {
    const result = validateConfig({ logging: true, maxEvents: 50, checkViews: false });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "maxEvents is very low, the event log will drop most entries",
      "checkViews is off, reads through stale views will not be detected",
    ]);
  });
});

describe("config files", () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.MEMOSEQ_LOGGING;
    delete process.env.MEMOSEQ_MAX_EVENTS;
    delete process.env.MEMOSEQ_CHECK_VIEWS;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "memoseq-config-"));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a JSON file", () => {
    const file = path.join(dir, "seq.json");
    fs.writeFileSync(file, JSON.stringify({ logging: true, max_events: 64 }));
    expect(configFromFile(file)).toEqual({ logging: true, maxEvents: 64, checkViews: true });
  });

  it("rejects missing files, other formats and non-objects", () => {
    expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow("Config file not found");

    const yaml = path.join(dir, "seq.yaml");
    fs.writeFileSync(yaml, "logging: true\n");
    expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");

    const arr = path.join(dir, "arr.json");
    fs.writeFileSync(arr, "[1, 2]");
    expect(() => configFromFile(arr)).toThrow("Config file must contain a JSON object");
  });

  it("auto-detects memoseq.config.json", () => {
    fs.writeFileSync(path.join(dir, "memoseq.config.json"), JSON.stringify({ logging: true }));
    expect(loadConfig({ cwd: dir }).logging).toBe(true);
  });

  it("applies overrides > file > env > defaults", () => {
    process.env.MEMOSEQ_MAX_EVENTS = "7";
    process.env.MEMOSEQ_CHECK_VIEWS = "0";
    const file = path.join(dir, "seq.json");
    fs.writeFileSync(file, JSON.stringify({ logging: true, maxEvents: 42 }));

    expect(loadConfig({ configFile: file })).toEqual({ logging: true, maxEvents: 42, checkViews: false });
    expect(loadConfig({ configFile: file, overrides: { maxEvents: 3 } }).maxEvents).toBe(3);
    expect(loadConfig({ cwd: dir })).toEqual({ logging: false, maxEvents: 7, checkViews: false });
  });

  it("feeds a sequence", () => {
    fs.writeFileSync(path.join(dir, "memoseq.config.json"), JSON.stringify({ logging: true }));
    const seq = Sequence.create<number>(n => n, { config: loadConfig({ cwd: dir }) });
    seq.get(1);
    expect(seq.events.map(e => e.tag)).toEqual(["Grow", "Compute", "Compute"]);
  });
});
