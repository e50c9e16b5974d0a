#!/usr/bin/env node

import { Command } from "commander";
import { createCommandContext, type CommandContext } from "./commands/context.js";
import { EXIT, type CommandFailure } from "./commands/exit-codes.js";
import { nuke } from "./commands/nuke.js";
import { renew } from "./commands/renew.js";
import { setSetting, unsetSetting } from "./commands/settings.js";
import { init, setup, type SetupResult } from "./commands/setup.js";
import { status } from "./commands/status.js";
import type { OutputFormat } from "./types/config.js";

type GlobalOpts = { format: OutputFormat; env?: string; configDir?: string; cwd?: string };

const program = new Command();

program
  .name("millctl")
  .description("Provision and refresh the factory environment")
  .version("0.1.0")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--config-dir <path>", "Directory holding millctl's base.yaml")
  .option("--cwd <path>", "Factory root (default: current directory)");

function globals(): GlobalOpts {
  const opts = program.opts<{ format: string; env?: string; configDir?: string; cwd?: string }>();
  if (opts.format !== "human" && opts.format !== "jsonl") {
    console.error(`Unknown format: ${opts.format}`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return { ...opts, format: opts.format };
}

function context(): { ctx: CommandContext; format: OutputFormat } {
  const g = globals();
  const ctx = createCommandContext({ cwd: g.cwd, env: g.env, configDir: g.configDir, format: g.format });
  return { ctx, format: g.format };
}

function fail(res: CommandFailure, format: OutputFormat, kinds: readonly string[]): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", error: res.error, exitCode: res.exitCode }) + "\n");
  } else {
    console.error(res.error);
    if (res.exitCode === EXIT.UNKNOWN_SPECIES) {
      console.error(`\nBefore continuing, run \`millctl set species <name>\` with one of: ${kinds.join(", ")}`);
    }
  }
  process.exit(res.exitCode);
}

function ok(format: OutputFormat, payload: Record<string, unknown>, human: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", ...payload }) + "\n");
  } else {
    console.log(human);
  }
}

async function runSetup(refresh: boolean | undefined, fn: typeof setup): Promise<void> {
  const { ctx, format } = context();
  const res: SetupResult = await fn(ctx, { refresh });
  if (!res.ok) fail(res, format, ctx.registry.kinds());
  ok(
    format,
    { species: res.species, action: res.action, state: res.state, setup_timestamp: res.record.setupTimestamp },
    res.action === "none" ? `${res.species}: up to date` : `${res.species}: ${res.action} complete`,
  );
}

program
  .command("setup")
  .description("Build the environment, or refresh it when dependency files changed")
  .option("--refresh", "Refresh even if nothing changed")
  .action(async (opts: { refresh?: boolean }) => runSetup(opts.refresh, setup));

program
  .command("init")
  .description("Alias for setup")
  .option("--refresh", "Refresh even if nothing changed")
  .action(async (opts: { refresh?: boolean }) => runSetup(opts.refresh, init));

program
  .command("nuke")
  .description("Delete the environment and data, and forget the species")
  .option("--sure", "Skip the confirmation questions")
  .action(async (opts: { sure?: boolean }) => {
    const { ctx, format } = context();
    const res = await nuke(ctx, { sure: opts.sure });
    if (!res.ok) fail(res, format, ctx.registry.kinds());
    ok(format, { cancelled: res.cancelled, removed: res.removed }, res.cancelled ? "Nothing nuked." : "Nuked.");
  });

program
  .command("renew")
  .description("Test cycle: nuke, set species, setup, run tests (destructive)")
  .argument("[species]", "Species to renew with")
  .option("--sure", "Skip the confirmation questions")
  .action(async (species: string | undefined, opts: { sure?: boolean }) => {
    const { ctx, format } = context();
    const res = await renew(ctx, { species, sure: opts.sure });
    if (!res.ok) fail(res, format, ctx.registry.kinds());
    ok(format, { species: res.species, cancelled: res.cancelled }, res.cancelled ? "Nothing renewed." : `Renewed ${res.species}.`);
  });

program
  .command("set")
  .description("Set a factory config value, e.g. `set species virtualenv`")
  .argument("<key>", "Config key")
  .argument("<value>", "Value (parsed as YAML scalar)")
  .action(async (key: string, value: string) => {
    const { ctx, format } = context();
    const res = await setSetting(ctx, key, value);
    if (!res.ok) fail(res, format, ctx.registry.kinds());
    ok(format, { key: res.key, value: res.value }, `${res.key} = ${JSON.stringify(res.value)}`);
  });

program
  .command("unset")
  .description("Remove a factory config value")
  .argument("<key>", "Config key")
  .action(async (key: string) => {
    const { ctx, format } = context();
    const res = await unsetSetting(ctx, key);
    if (!res.ok) fail(res, format, ctx.registry.kinds());
    ok(format, { key: res.key }, `${res.key} unset`);
  });

program
  .command("status")
  .description("Show the environment record and whether it is stale")
  .action(async () => {
    const { ctx, format } = context();
    const res = await status(ctx);
    if (!res.ok) fail(res, format, ctx.registry.kinds());
    const { record } = res;
    const summary = !res.configured
      ? "no species configured"
      : res.stale === null
        ? `${record.speciesKind}: not set up yet`
        : `${record.speciesKind}: ${res.stale ? `stale (${res.changed.join(", ")})` : "up to date"}`;
    ok(format, { ...record, stale: res.stale, changed: res.changed }, summary);
  });

program
  .command("species")
  .description("List the available species")
  .action(() => {
    const { ctx, format } = context();
    for (const kind of ctx.registry.kinds()) ok(format, { species: kind }, kind);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
