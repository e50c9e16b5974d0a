import { checkStaleness } from "../core/staleness.js";
import { readEnvironmentRecord } from "../store/environment-record.js";
import type { EnvironmentRecord } from "../types/record.js";
import type { CommandContext } from "./context.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type StatusResult =
  | { ok: true; record: EnvironmentRecord; configured: boolean; stale: boolean | null; changed: string[] }
  | CommandFailure;

/**
 * Read the environment record and check staleness without running anything.
 * `stale` is null until the environment has been set up once.
 */
export async function status(ctx: CommandContext): Promise<StatusResult> {
  try {
    const record = readEnvironmentRecord(await ctx.store.read(), ctx.store.location);
    if (record.speciesKind === null) {
      return { ok: true, record, configured: false, stale: null, changed: [] };
    }
    const species = ctx.registry.lookup(record.speciesKind);
    if (record.setupTimestamp === null) {
      return { ok: true, record, configured: true, stale: null, changed: [] };
    }
    const { stale, changed } = await checkStaleness(species, record.setupTimestamp, ctx.cwd);
    return { ok: true, record, configured: true, stale, changed };
  } catch (e) {
    return failure(e);
  }
}
