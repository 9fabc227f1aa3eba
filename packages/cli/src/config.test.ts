import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PktmapError } from "@pktmap/schemas";
import {
  DEFAULTS, configFromEnv, configFromFlags, loadConfigFile, parseConfigYaml, parseForcedSsids, resolveConfig,
  resolveViewSettings,
} from "./config.js";

describe("resolveConfig", () => {
  it("fills defaults and starts at the local node", () => {
    const config = resolveConfig([DEFAULTS, { local_node: "n1alf-15" }]);
    expect(config.local_node).toBe("N1ALF-15");
    expect(config.start_node).toBe("N1ALF-15");
    expect(config.max_hops).toBe(10);
    expect(config.port).toBe(8010);
    expect(config.stale_after_ms).toBe(86_400_000);
    expect(config.node_delay_ms).toBe(2000);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("lets later layers win and merges credentials field by field", () => {
    const env = configFromEnv({ PKTMAP_CALLSIGN: "n1alf-15", PKTMAP_USER: "n1alf", PKTMAP_PASS: "test-secret" });
    const flags = configFromFlags("3", undefined, { user: "sysop" });
    const config = resolveConfig([DEFAULTS, { max_hops: 5, host: "node.local" }, env, flags]);
    expect(config.max_hops).toBe(3);
    expect(config.host).toBe("node.local");
    expect(config.credentials).toEqual({ username: "sysop", password: "test-secret" });
  });

  it("requires a local node callsign", () => {
    expect(() => resolveConfig([DEFAULTS])).toThrow(PktmapError);
    expect(() => resolveConfig([DEFAULTS])).toThrow(/Local node callsign is unknown/);
  });

  it("rejects unknown keys and bad values", () => {
    expect(() => resolveConfig([DEFAULTS, { local_node: "N1ALF-15", max_hop: 3 }])).toThrow(
      /must NOT have additional properties/,
    );
    expect(() => resolveConfig([DEFAULTS, { local_node: "N1ALF-15", mode: "sideways" }])).toThrow(
      /Invalid configuration: \/mode/,
    );
  });
});

describe("configFromFlags", () => {
  it("maps positionals and flags onto config keys", () => {
    const layer = configFromFlags("3", "n1brv-7", {
      exclude: ["n1chr,n1dlt-5"],
      force: ["n1alf-15"],
      overwrite: true,
      delay: "0",
      csv: false,
      debug: true,
    });
    expect(layer).toEqual({
      max_hops: 3,
      start_node: "N1BRV-7",
      exclude: ["N1CHR", "N1DLT-5"],
      force_ssid: { N1ALF: 15 },
      write_mode: "overwrite",
      node_delay_ms: 0,
      csv_path: null,
      log_level: "debug",
    });
  });

  it("rejects a hop limit that is not a whole number", () => {
    expect(() => configFromFlags("two", undefined, {})).toThrow('Invalid max hops: "two" (must be an integer 0–50)');
  });
});

describe("parseForcedSsids", () => {
  it("needs an SSID in range", () => {
    expect(() => parseForcedSsids(["N1ALF"])).toThrow('Invalid --force value "N1ALF": missing ssid');
    expect(() => parseForcedSsids(["N1ALF-16"])).toThrow('Invalid --force value "N1ALF-16": ssid out of range');
  });
});

describe("resolveViewSettings", () => {
  it("takes the graph path and exclusions without needing a callsign", () => {
    expect(resolveViewSettings([])).toEqual({ output_path: "nodemap.json", exclude: [] });
    expect(resolveViewSettings([
      { output_path: "maps/home.json", exclude: ["n1brv", "N1CHR-3"], mode: "reaudit" },
      configFromFlags(undefined, undefined, { exclude: ["n1dlt"] }),
    ])).toEqual({ output_path: "maps/home.json", exclude: ["N1DLT"] });
  });

  it("rejects an exclusion list that is not a list of strings", () => {
    expect(() => resolveViewSettings([{ exclude: "N1BRV" }])).toThrow(
      "Invalid configuration: /exclude must be a list of callsigns",
    );
  });
});

describe("configFromEnv", () => {
  it("reads host, port and callsign", () => {
    expect(configFromEnv({ PKTMAP_HOST: "10.0.0.2", PKTMAP_PORT: "8011", PKTMAP_CALLSIGN: "n1alf-15" })).toEqual({
      host: "10.0.0.2",
      port: 8011,
      local_node: "N1ALF-15",
    });
  });

  it("rejects a port outside 1–65535", () => {
    expect(() => configFromEnv({ PKTMAP_PORT: "70000" })).toThrow(PktmapError);
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pktmap-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("parses a YAML mapping", () => {
    expect(parseConfigYaml("max_hops: 3\nexclude:\n  - N1BRV\n", "pktmap.yaml")).toEqual({ max_hops: 3, exclude: ["N1BRV"] });
    expect(parseConfigYaml("", "pktmap.yaml")).toEqual({});
    expect(() => parseConfigYaml("- a\n- b\n", "pktmap.yaml")).toThrow("pktmap.yaml: expected a mapping at the top level");
  });

  it("loads a named file and fails when it is missing", async () => {
    const path = join(dir, "crawl.yaml");
    await writeFile(path, "local_node: N1ALF-15\nmode: reaudit\n", "utf-8");
    expect(await loadConfigFile(path)).toEqual({ local_node: "N1ALF-15", mode: "reaudit" });
    await expect(loadConfigFile(join(dir, "absent.yaml"))).rejects.toThrow(/Cannot read config file/);
  });
});
