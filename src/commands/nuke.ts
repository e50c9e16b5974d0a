import fs from "node:fs";
import path from "node:path";
import { EMPTY_RECORD, withEnvironmentRecord } from "../store/environment-record.js";
import type { CommandContext } from "./context.js";
import { confirmAll } from "./confirm.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type NukeResult = { ok: true; cancelled: boolean; removed: string[] } | CommandFailure;

export const NUKE_QUESTIONS = ["okay to nuke everything", "confirm"] as const;

/** Resolve `name` to a folder strictly below `cwd`. */
function insideDir(cwd: string, name: string): string {
  const dir = path.resolve(cwd, name);
  const rel = path.relative(cwd, dir);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new Error(`Refusing to delete outside the working directory: ${name}`);
  }
  return dir;
}

/**
 * Start from scratch: forget the environment record, then delete the env and
 * data folders. Connections are kept. Asks twice unless `sure`.
 */
export async function nuke(ctx: CommandContext, opts: { sure?: boolean } = {}): Promise<NukeResult> {
  if (!opts.sure && !(await confirmAll(ctx.confirm, NUKE_QUESTIONS))) {
    return { ok: true, cancelled: true, removed: [] };
  }

  try {
    const targets = ctx.config.nuke.directories.map((name) => ({ name, dir: insideDir(ctx.cwd, name) }));

    // cleared first: a half-deleted env is then rebuilt from kickstart
    const map = await ctx.store.read();
    await ctx.store.write(withEnvironmentRecord(map, EMPTY_RECORD));

    const removed: string[] = [];
    for (const { name, dir } of targets) {
      if (!fs.existsSync(dir)) continue;
      fs.rmSync(dir, { recursive: true, force: true });
      removed.push(name);
    }
    ctx.report({ level: "info", code: "NOTE", message: `nuked ${removed.length > 0 ? removed.join(", ") : "nothing"}` });
    return { ok: true, cancelled: false, removed };
  } catch (e) {
    return failure(e);
  }
}
