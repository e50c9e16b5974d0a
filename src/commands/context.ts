import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { Provisioner } from "../core/provisioner.js";
import { createReporter, type Reporter } from "../log/reporter.js";
import { BashExecutor, type ShellExecutor } from "../shell/executor.js";
import { createDefaultRegistry } from "../species/builtin.js";
import type { SpeciesRegistry } from "../species/registry.js";
import { YamlConfigStore, type ConfigStore } from "../store/config-store.js";
import type { MillConfig, OutputFormat } from "../types/config.js";
import { askOnTerminal, type Confirm } from "./confirm.js";

/** Everything a command needs, wired once per CLI invocation. */
export type CommandContext = {
  cwd: string;
  config: MillConfig;
  registry: SpeciesRegistry;
  store: ConfigStore;
  shell: ShellExecutor;
  report: Reporter;
  confirm: Confirm;
};

export function createCommandContext(opts: {
  cwd?: string;
  env?: string;
  configDir?: string;
  format?: OutputFormat;
}): CommandContext {
  const cwd = path.resolve(opts.cwd ?? process.cwd());
  const config = loadConfig(opts.env, opts.configDir);
  return {
    cwd,
    config,
    registry: createDefaultRegistry(),
    store: new YamlConfigStore(path.join(cwd, config.config_file)),
    shell: new BashExecutor(cwd),
    report: createReporter({
      format: opts.format ?? "human",
      logFile: path.join(cwd, config.logs_dir, "millctl.log"),
    }),
    confirm: askOnTerminal,
  };
}

export function createProvisioner(ctx: CommandContext): Provisioner {
  return new Provisioner({
    cwd: ctx.cwd,
    store: ctx.store,
    registry: ctx.registry,
    shell: ctx.shell,
    report: ctx.report,
    requiredFolders: ctx.config.required_folders,
    logsDir: ctx.config.logs_dir,
  });
}
