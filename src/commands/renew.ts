import path from "node:path";
import { UnknownSpeciesError } from "../errors/UnknownSpeciesError.js";
import type { ConfigMap } from "../types/record.js";
import type { CommandContext } from "./context.js";
import { confirmAll } from "./confirm.js";
import { EXIT, failure, type CommandFailure } from "./exit-codes.js";
import { nuke } from "./nuke.js";
import { setup } from "./setup.js";

export type RenewResult = { ok: true; cancelled: boolean; species: string } | CommandFailure;

export const RENEW_QUESTIONS = ["`renew` is a test set that deletes everything. okay?", "confirm"] as const;

/**
 * Test cycle for one species: nuke, configure the species, setup, run the
 * species' test command. Destroys the current environment.
 */
export async function renew(ctx: CommandContext, opts: { species?: string; sure?: boolean }): Promise<RenewResult> {
  const species = opts.species;
  if (!species) return { ok: false, error: "renew needs a species", exitCode: EXIT.INVALID_ARGS };
  if (!ctx.registry.has(species)) return failure(new UnknownSpeciesError(species, ctx.registry.kinds()));
  const workflow = ctx.config.renew?.[species];
  if (!workflow) return { ok: false, error: `no test workflow for species ${species}`, exitCode: EXIT.INVALID_ARGS };

  if (!opts.sure && !(await confirmAll(ctx.confirm, RENEW_QUESTIONS))) {
    return { ok: true, cancelled: true, species };
  }

  const nuked = await nuke(ctx, { sure: true });
  if (!nuked.ok) return nuked;

  try {
    const map = await ctx.store.read();
    const next: ConfigMap = { ...map, ...workflow.settings, species };
    await ctx.store.write(next);
  } catch (e) {
    return failure(e);
  }

  const built = await setup(ctx, { refresh: false });
  if (!built.ok) return built;

  try {
    ctx.report({ level: "info", code: "STATUS", message: `running ${workflow.test_command}` });
    await ctx.shell.run(workflow.test_command, path.join(ctx.cwd, ctx.config.logs_dir, "log-renew-test"));
  } catch (e) {
    return failure(e);
  }
  return { ok: true, cancelled: false, species };
}
