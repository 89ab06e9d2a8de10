#!/usr/bin/env node
import { access } from "node:fs/promises";
import { Command } from "commander";
import type { AppConfig, SignalType } from "@tailscope/contracts";
import {
  AgentBuilderClient,
  App,
  createFileLogger,
  DEFAULT_CONFIG_PATH,
  EsqlDataSource,
  isLookback,
  loadConfig,
  LOOKBACKS,
  type PartialAppConfigInput,
  readConfigFile,
  saveConfig,
  SIGNAL_INDEX,
} from "@tailscope/core";
import { openExternal } from "./browser.js";
import { copyToClipboard } from "./clipboard.js";
import { ContainerCollector } from "./collector.js";
import { runTerminal, Ticker } from "./terminal.js";

const SIGNALS: readonly SignalType[] = ["logs", "traces", "metrics", "chat"];
const MASK = "********";

interface GlobalOptions {
  config: string;
  profile?: string;
  esUrl?: string;
  index?: string;
  lookback?: string;
  autoRefresh: boolean;
}

function isSignal(value: string): value is SignalType {
  return (SIGNALS as readonly string[]).includes(value);
}

function flagOverrides(opts: GlobalOptions): PartialAppConfigInput {
  const overrides: PartialAppConfigInput = {};
  if (opts.esUrl) overrides.es = { url: opts.esUrl };
  if (opts.autoRefresh === false) overrides.tui = { autoRefresh: false };
  return overrides;
}

async function resolveConfig(opts: GlobalOptions): Promise<AppConfig> {
  return await loadConfig(opts.config, { overrides: flagOverrides(opts), profile: opts.profile });
}

function maskSecrets(config: AppConfig): AppConfig {
  return {
    ...config,
    es: {
      ...config.es,
      apiKey: config.es.apiKey ? MASK : "",
      password: config.es.password ? MASK : "",
    },
  };
}

function dataSourceFor(config: AppConfig, index: string): EsqlDataSource {
  return new EsqlDataSource({
    url: config.es.url,
    index,
    apiKey: config.es.apiKey,
    username: config.es.username,
    password: config.es.password,
  });
}

const program = new Command();
program.name("tailscope").description("Browse logs, traces and metrics stored in Elasticsearch from the terminal");
program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
program.option("--profile <name>", "Connection profile from the config file");
program.option("--es-url <url>", "Elasticsearch URL");
program.option("--index <pattern>", "Index pattern to query");
program.option("--lookback <window>", `Initial time window (${LOOKBACKS.join(", ")})`);
program.option("--no-auto-refresh", "Start with auto-refresh off");
program.argument("[signal]", `Signal to open (${SIGNALS.join(", ")})`, "logs");
program.addHelpText(
  "after",
  `
Examples:
  tailscope
  tailscope traces --lookback 24h
  tailscope --profile prod metrics
  tailscope logs --index "logs-app-*" --no-auto-refresh
  tailscope config show
  tailscope ping`,
);

program.action(async (signalArg: string) => {
  const opts = program.opts<GlobalOptions>();
  if (!isSignal(signalArg)) {
    throw new Error(`unknown signal: ${signalArg} (expected one of ${SIGNALS.join(", ")})`);
  }
  if (opts.lookback !== undefined && !isLookback(opts.lookback)) {
    throw new Error(`invalid lookback: ${opts.lookback} (expected one of ${LOOKBACKS.join(", ")})`);
  }
  const lookback = opts.lookback !== undefined && isLookback(opts.lookback) ? opts.lookback : undefined;

  const config = await resolveConfig(opts);
  const index = opts.index ?? (signalArg === "logs" || signalArg === "chat" ? config.es.index : SIGNAL_INDEX[signalArg]);
  const logger = createFileLogger({ logPath: config.log.path, level: config.log.level });
  logger.info("starting", { signal: signalArg, index, esUrl: config.es.url });

  const ticker = new Ticker();
  const app = new App({
    config,
    dataSource: dataSourceFor(config, index),
    chat: new AgentBuilderClient({ kibana: config.kibana, credentials: config.es }),
    effects: {
      copyToClipboard,
      openUrl: openExternal,
      collector: new ContainerCollector({ config: config.collector, openFile: openExternal, logger }),
    },
    logger,
    signal: signalArg,
    lookback,
    scheduleTick: ticker.schedule,
  });
  await runTerminal(app, { stdin: process.stdin, stdout: process.stdout, logger, ticker });
});

const configCmd = program.command("config").description("Configuration");

configCmd
  .command("show")
  .description("Print the effective configuration as JSON")
  .option("--show-secrets", "Print passwords and API keys unmasked")
  .action(async (opts: { showSecrets?: boolean }) => {
    const config = await resolveConfig(program.opts<GlobalOptions>());
    console.log(JSON.stringify(opts.showSecrets ? config : maskSecrets(config), null, 2));
  });

configCmd
  .command("init")
  .description("Write the effective configuration to the config file")
  .option("--force", "Overwrite an existing file")
  .action(async (opts: { force?: boolean }) => {
    const globals = program.opts<GlobalOptions>();
    const exists = await access(globals.config).then(
      () => true,
      () => false,
    );
    if (exists && !opts.force) {
      throw new Error(`config already exists: ${globals.config} (use --force to overwrite)`);
    }
    const existing = exists ? await readConfigFile(globals.config) : {};
    const config = await loadConfig(globals.config, { overrides: flagOverrides(globals), profile: false });
    await saveConfig(config, globals.config, existing);
    console.log(`wrote ${globals.config}`);
  });

program
  .command("ping")
  .description("Check that Elasticsearch is reachable")
  .action(async () => {
    const globals = program.opts<GlobalOptions>();
    const config = await resolveConfig(globals);
    const dataSource = dataSourceFor(config, globals.index ?? config.es.index);
    await dataSource.ping(AbortSignal.timeout(config.es.timeoutMs));
    console.log(`ok ${config.es.url}`);
  });

void program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
