import { spawn } from "node:child_process";
import { access } from "node:fs/promises";
import path from "node:path";
import chokidar from "chokidar";
import type { CollectorConfig, CollectorOpened, CollectorValidation } from "@tailscope/contracts";
import { type CollectorControl, createNoopLogger, expandHome, type Logger } from "@tailscope/core";

/** Where the collector image reads its config and keeps its binary. */
export const COLLECTOR_CONFIG_MOUNT = "/etc/otelcol-contrib/config.yaml";
export const COLLECTOR_BINARY = "/usr/share/elastic-agent/otelcol";

const WRITE_SETTLE_MS = 200;
const ERROR_HINTS = ["error", "cannot", "invalid", "failed", "yaml:"];

export interface CommandOutput {
  code: number;
  output: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandOutput>;

export interface ContainerCollectorOptions {
  config: CollectorConfig;
  /** Container CLI, `docker` or `podman`. */
  runtime?: string;
  run?: CommandRunner;
  /** Opens the config file for editing. */
  openFile?: (filePath: string) => Promise<void>;
  logger?: Logger;
}

/** Runs a command to completion, collecting stdout and stderr together. */
export async function runCapture(command: string, args: string[]): Promise<CommandOutput> {
  return await new Promise<CommandOutput>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const chunks: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.once("error", reject);
    child.once("close", (code) => {
      resolve({ code: code ?? 1, output: Buffer.concat(chunks).toString("utf8").trim() });
    });
  });
}

/** Keeps the lines of validator output that describe the problem. */
export function extractErrorLines(output: string): string {
  const lines = output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => {
      const lower = line.toLowerCase();
      return ERROR_HINTS.some((hint) => lower.includes(hint));
    });
  return lines.length > 0 ? lines.join("\n") : output.trim();
}

/**
 * Edits the config of a collector running in a container: the file is mounted into the container,
 * validated with the collector's own `validate` command and applied by restarting the container.
 */
export class ContainerCollector implements CollectorControl {
  private readonly configPath: string;
  private readonly container: string;
  private readonly runtime: string;
  private readonly run: CommandRunner;
  private readonly openFile: ((filePath: string) => Promise<void>) | undefined;
  private readonly logger: Logger;

  constructor(options: ContainerCollectorOptions) {
    this.configPath = options.config.configPath ? path.resolve(expandHome(options.config.configPath)) : "";
    this.container = options.config.container;
    this.runtime = options.runtime ?? "docker";
    this.run = options.run ?? runCapture;
    this.openFile = options.openFile;
    this.logger = options.logger ?? createNoopLogger();
  }

  async open(): Promise<CollectorOpened> {
    if (!this.configPath) {
      throw new Error("No collector config path is set. Add collector.configPath to the config file.");
    }
    try {
      await access(this.configPath);
    } catch {
      throw new Error(`Collector config not found: ${this.configPath}`);
    }
    if (!(await this.isRunning())) {
      throw new Error(`Collector container ${this.container} is not running.`);
    }
    if (this.openFile) {
      try {
        await this.openFile(this.configPath);
      } catch (error) {
        throw new Error(`failed to open editor: ${error instanceof Error ? error.message : String(error)}`, {
          cause: error,
        });
      }
    }
    return { configPath: this.configPath };
  }

  watch(configPath: string, onChange: (changedPath: string) => void): () => void {
    const watcher = chokidar.watch(configPath, {
      ignoreInitial: true,
      persistent: true,
      awaitWriteFinish: {
        stabilityThreshold: WRITE_SETTLE_MS,
        pollInterval: 40,
      },
    });
    const onWrite = (rawPath: string): void => onChange(path.resolve(rawPath));
    watcher.on("add", onWrite);
    watcher.on("change", onWrite);
    watcher.on("error", (error) => {
      this.logger.warn("collector config watcher failed", { error: String(error) });
    });
    return () => {
      watcher.close().catch((error: unknown) => {
        this.logger.warn("collector config watcher did not close", { error: String(error) });
      });
    };
  }

  async validate(_configPath: string): Promise<CollectorValidation> {
    const { code, output } = await this.run(this.runtime, [
      "exec",
      this.container,
      COLLECTOR_BINARY,
      "validate",
      `--config=${COLLECTOR_CONFIG_MOUNT}`,
    ]);
    if (code === 0) return { valid: true, message: "" };
    const message = output ? extractErrorLines(output) : `validate exited with code ${code}`;
    this.logger.info("collector config rejected", { container: this.container });
    return { valid: false, message };
  }

  /** Restarts the container; the collector reads its config on start. */
  async reload(): Promise<void> {
    const { code, output } = await this.run(this.runtime, ["restart", this.container]);
    if (code !== 0) {
      throw new Error(`restart collector: ${output || `exit ${code}`}`);
    }
    this.logger.info("collector restarted", { container: this.container });
  }

  private async isRunning(): Promise<boolean> {
    try {
      const { code, output } = await this.run(this.runtime, ["inspect", "--format", "{{.State.Running}}", this.container]);
      return code === 0 && output.trim() === "true";
    } catch (error) {
      this.logger.debug("container runtime unavailable", { runtime: this.runtime, error: String(error) });
      return false;
    }
  }
}
