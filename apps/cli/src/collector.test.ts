import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { type CommandRunner, ContainerCollector, extractErrorLines } from "./collector.js";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

async function writeCollectorConfig(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "tailscope-collector-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "otel-config.yaml");
  await writeFile(configPath, "receivers:\n  otlp: {}\n", "utf8");
  return configPath;
}

function runnerReturning(...outputs: Array<{ code: number; output: string }>) {
  const run = vi.fn<CommandRunner>();
  for (const output of outputs) {
    run.mockResolvedValueOnce(output);
  }
  return run;
}

describe("extractErrorLines", () => {
  it("keeps only lines that describe a failure", () => {
    const output = "info starting\n  Error: invalid receiver\nwarn deprecated\nyaml: line 3: bad indent";
    expect(extractErrorLines(output)).toBe("Error: invalid receiver\nyaml: line 3: bad indent");
  });

  it("falls back to the whole output", () => {
    expect(extractErrorLines("  exit status 2 \n")).toBe("exit status 2");
  });
});

describe("ContainerCollector", () => {
  it("rejects open without a config path", async () => {
    const collector = new ContainerCollector({ config: { configPath: "", container: "otel" }, run: runnerReturning() });
    await expect(collector.open()).rejects.toThrow("No collector config path is set");
  });

  it("rejects open when the file is missing", async () => {
    const missing = path.join(os.tmpdir(), "tailscope-missing", "config.yaml");
    const collector = new ContainerCollector({
      config: { configPath: missing, container: "otel" },
      run: runnerReturning(),
    });
    await expect(collector.open()).rejects.toThrow(`Collector config not found: ${missing}`);
  });

  it("rejects open when the container is stopped", async () => {
    const configPath = await writeCollectorConfig();
    const run = runnerReturning({ code: 0, output: "false" });
    const collector = new ContainerCollector({ config: { configPath, container: "otel" }, run });

    await expect(collector.open()).rejects.toThrow("Collector container otel is not running.");
    expect(run).toHaveBeenCalledWith("docker", ["inspect", "--format", "{{.State.Running}}", "otel"]);
  });

  it("opens the config file in the editor", async () => {
    const configPath = await writeCollectorConfig();
    const openFile = vi.fn<(filePath: string) => Promise<void>>().mockResolvedValue(undefined);
    const collector = new ContainerCollector({
      config: { configPath, container: "otel" },
      runtime: "podman",
      run: runnerReturning({ code: 0, output: "true\n" }),
      openFile,
    });

    await expect(collector.open()).resolves.toEqual({ configPath });
    expect(openFile).toHaveBeenCalledWith(configPath);
  });

  it("reports editor failures", async () => {
    const configPath = await writeCollectorConfig();
    const collector = new ContainerCollector({
      config: { configPath, container: "otel" },
      run: runnerReturning({ code: 0, output: "true" }),
      openFile: () => Promise.reject(new Error("xdg-open missing")),
    });
    await expect(collector.open()).rejects.toThrow("failed to open editor: xdg-open missing");
  });

  it("validates inside the container", async () => {
    const run = runnerReturning({ code: 0, output: "" });
    const collector = new ContainerCollector({ config: { configPath: "/tmp/c.yaml", container: "otel" }, run });

    await expect(collector.validate("/tmp/c.yaml")).resolves.toEqual({ valid: true, message: "" });
    expect(run).toHaveBeenCalledWith("docker", [
      "exec",
      "otel",
      "/usr/share/elastic-agent/otelcol",
      "validate",
      "--config=/etc/otelcol-contrib/config.yaml",
    ]);
  });

  it("returns the validator's error lines", async () => {
    const run = runnerReturning({ code: 1, output: "starting\nError: unknown exporter \"foo\"" });
    const collector = new ContainerCollector({ config: { configPath: "/tmp/c.yaml", container: "otel" }, run });

    await expect(collector.validate("/tmp/c.yaml")).resolves.toEqual({
      valid: false,
      message: 'Error: unknown exporter "foo"',
    });
  });

  it("names the exit code when the validator prints nothing", async () => {
    const collector = new ContainerCollector({
      config: { configPath: "/tmp/c.yaml", container: "otel" },
      run: runnerReturning({ code: 3, output: "" }),
    });
    await expect(collector.validate("/tmp/c.yaml")).resolves.toEqual({
      valid: false,
      message: "validate exited with code 3",
    });
  });

  it("restarts the container on reload", async () => {
    const run = runnerReturning({ code: 0, output: "otel" }, { code: 1, output: "no such container" });
    const collector = new ContainerCollector({ config: { configPath: "/tmp/c.yaml", container: "otel" }, run });

    await expect(collector.reload()).resolves.toBeUndefined();
    expect(run).toHaveBeenCalledWith("docker", ["restart", "otel"]);
    await expect(collector.reload()).rejects.toThrow("restart collector: no such container");
  });
});
