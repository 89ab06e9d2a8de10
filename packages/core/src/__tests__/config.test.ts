import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  configFromEnv,
  expandEnvRef,
  layerConfig,
  loadConfig,
  mergeConfig,
  readConfigFile,
  resolveProfile,
  saveConfig,
} from "../config.js";
import { ConfigError } from "../errors.js";

describe("config", () => {
  it("provides defaults for backend, ui timings and logging", () => {
    const config = mergeConfig();
    expect(config.es.url).toBe("http://localhost:9200");
    expect(config.es.index).toBe("logs-*");
    expect(config.tui.tickIntervalMs).toBe(2000);
    expect(config.tui.logsTimeoutMs).toBe(10000);
    expect(config.tui.metricsTimeoutMs).toBe(30000);
    expect(config.tui.tracesTimeoutMs).toBe(30000);
    expect(config.tui.fieldCapsTimeoutMs).toBe(10000);
    expect(config.tui.autoDetectTimeoutMs).toBe(30000);
    expect(config.tui.statusMessageMs).toBe(2000);
    expect(config.tui.autoRefresh).toBe(true);
    expect(config.log.level).toBe("info");
  });

  it("falls back to defaults for invalid values", () => {
    const config = mergeConfig({
      es: { url: "   ", timeoutMs: -5 },
      tui: { tickIntervalMs: 0, pageSize: Number.NaN },
    });
    expect(config.es.url).toBe("http://localhost:9200");
    expect(config.es.timeoutMs).toBe(30000);
    expect(config.tui.tickIntervalMs).toBe(2000);
    expect(config.tui.pageSize).toBe(100);
  });

  it("strips trailing slashes from urls", () => {
    const config = mergeConfig({ es: { url: "https://es.example:9243///" }, kibana: { url: "https://kb.example/" } });
    expect(config.es.url).toBe("https://es.example:9243");
    expect(config.kibana.url).toBe("https://kb.example");
  });

  it("reads TAILSCOPE_* environment variables", () => {
    const partial = configFromEnv({
      TAILSCOPE_ES_URL: "http://env:9200",
      TAILSCOPE_AUTO_REFRESH: "false",
      TAILSCOPE_TICK_INTERVAL_MS: "5000",
      TAILSCOPE_LOG_LEVEL: "debug",
    });
    expect(partial.es).toEqual({ url: "http://env:9200" });
    expect(partial.tui).toEqual({ autoRefresh: false, tickIntervalMs: 5000 });
    expect(partial.log).toEqual({ level: "debug" });
  });

  it("ignores malformed environment values", () => {
    const partial = configFromEnv({ TAILSCOPE_AUTO_REFRESH: "maybe", TAILSCOPE_TICK_INTERVAL_MS: "soon" });
    expect(partial.tui).toEqual({});
  });

  it("layers later sources over earlier ones per key", () => {
    const layered = layerConfig(
      { es: { url: "http://file:9200", index: "file-*" } },
      { es: { url: "http://env:9200" } },
      { es: { index: "flag-*" } },
    );
    expect(layered.es).toEqual({ url: "http://env:9200", index: "flag-*" });
  });

  it("applies file, then env, then overrides", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "tailscope-config-"));
    const configPath = path.join(root, "config.toml");
    await writeFile(
      configPath,
      `
[es]
url = "http://file:9200"
index = "file-*"
apiKey = "test-secret"

[tui]
tickIntervalMs = 4000
autoRefresh = true

[log]
level = "verbose"
`,
      "utf8",
    );

    const config = await loadConfig(configPath, {
      env: { TAILSCOPE_ES_URL: "http://env:9200", TAILSCOPE_AUTO_REFRESH: "0" },
      overrides: { es: { index: "flag-*" } },
    });
    expect(config.es.url).toBe("http://env:9200");
    expect(config.es.index).toBe("flag-*");
    expect(config.es.apiKey).toBe("test-secret");
    expect(config.tui.tickIntervalMs).toBe(4000);
    expect(config.tui.autoRefresh).toBe(false);
    expect(config.log.level).toBe("info");
  });

  it("returns defaults when the file is missing", async () => {
    const config = await loadConfig(path.join(os.tmpdir(), "tailscope-missing", "nope.toml"), { env: {} });
    expect(config).toEqual(mergeConfig());
  });

  it("rejects a malformed file", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "tailscope-config-"));
    const configPath = path.join(root, "config.toml");
    await writeFile(configPath, "[es\nurl = ", "utf8");
    await expect(loadConfig(configPath, { env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it("saves a config that loads back unchanged", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "tailscope-config-"));
    const configPath = path.join(root, "nested", "config.toml");
    const config = mergeConfig({ es: { index: "traces-*" }, tui: { autoRefresh: false } });
    await saveConfig(config, configPath);
    const raw = await readFile(configPath, "utf8");
    expect(raw).toContain('index = "traces-*"');
    expect(await loadConfig(configPath, { env: {} })).toEqual(config);
  });
});

describe("connection profiles", () => {
  const PROFILES = `
currentProfile = "local"

[es]
url = "http://file:9200"
index = "file-*"

[profiles.local.es]
url = "http://localhost:9200"

[profiles.prod.es]
url = "https://prod.es.test:9243"
username = "elastic"
password = "\${PROD_ES_PASSWORD}"

[profiles.prod.kibana]
url = "https://prod.kb.test"
space = "ops"
`;

  async function profileConfigPath(): Promise<string> {
    const root = await mkdtemp(path.join(os.tmpdir(), "tailscope-profiles-"));
    const configPath = path.join(root, "config.toml");
    await writeFile(configPath, PROFILES, "utf8");
    return configPath;
  }

  it("expands whole-value environment references only", () => {
    const env = { PROD_ES_PASSWORD: "test-secret" };
    expect(expandEnvRef("${PROD_ES_PASSWORD}", env)).toBe("test-secret");
    expect(expandEnvRef("${MISSING}", env)).toBeUndefined();
    expect(expandEnvRef("plain-${PROD_ES_PASSWORD}", env)).toBe("plain-${PROD_ES_PASSWORD}");
  });

  it("applies the current profile over the file sections", async () => {
    const config = await loadConfig(await profileConfigPath(), { env: {} });
    expect(config.es.url).toBe("http://localhost:9200");
    expect(config.es.index).toBe("file-*");
  });

  it("selects a named profile and expands its credentials", async () => {
    const config = await loadConfig(await profileConfigPath(), {
      env: { PROD_ES_PASSWORD: "test-secret" },
      profile: "prod",
    });
    expect(config.es.url).toBe("https://prod.es.test:9243");
    expect(config.es.username).toBe("elastic");
    expect(config.es.password).toBe("test-secret");
    expect(config.kibana).toEqual({ url: "https://prod.kb.test", space: "ops" });
  });

  it("picks the profile from TAILSCOPE_PROFILE and lets env and flags override it", async () => {
    const config = await loadConfig(await profileConfigPath(), {
      env: { TAILSCOPE_PROFILE: "prod", PROD_ES_PASSWORD: "test-secret", TAILSCOPE_ES_USERNAME: "reader" },
      overrides: { es: { url: "http://flag:9200" } },
    });
    expect(config.es.url).toBe("http://flag:9200");
    expect(config.es.username).toBe("reader");
    expect(config.es.password).toBe("test-secret");
  });

  it("rejects an unknown profile", async () => {
    const configPath = await profileConfigPath();
    await expect(loadConfig(configPath, { env: {}, profile: "staging" })).rejects.toThrow('profile "staging" not found');
    expect(() => resolveProfile({ profiles: {} }, "toString", {})).toThrow(ConfigError);
  });

  it("rejects a credential that names an unset variable", async () => {
    await expect(loadConfig(await profileConfigPath(), { env: {}, profile: "prod" })).rejects.toThrow(
      'profile "prod": undefined environment variable in password: ${PROD_ES_PASSWORD}',
    );
  });

  it("keeps profiles and their references when saving", async () => {
    const configPath = await profileConfigPath();
    const existing = await readConfigFile(configPath);
    const config = await loadConfig(configPath, { env: {}, profile: false });
    expect(config.es.url).toBe("http://file:9200");

    await saveConfig(config, configPath, existing);
    const saved = await readConfigFile(configPath);
    expect(saved.currentProfile).toBe("local");
    expect(saved.profiles?.prod?.es?.password).toBe("${PROD_ES_PASSWORD}");
    expect(await loadConfig(configPath, { env: {}, profile: false })).toEqual(config);
  });

  it("yields an empty layer without a profile", () => {
    expect(resolveProfile({ es: { url: "http://file:9200" } }, undefined, {})).toEqual({});
  });
});
