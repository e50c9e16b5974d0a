import type { ProvisionResult } from "../core/provisioner.js";
import { createProvisioner, type CommandContext } from "./context.js";
import { failure, type CommandFailure } from "./exit-codes.js";

export type SetupResult = ({ ok: true } & ProvisionResult) | CommandFailure;

/**
 * Build the environment on first run, refresh it when a dependency file
 * changed or `refresh` is set, otherwise leave it alone.
 */
export async function setup(ctx: CommandContext, opts: { refresh?: boolean } = {}): Promise<SetupResult> {
  try {
    const result = await createProvisioner(ctx).run({ refresh: opts.refresh });
    return { ok: true, ...result };
  } catch (e) {
    return failure(e);
  }
}

/** Same as setup. */
export function init(ctx: CommandContext, opts: { refresh?: boolean } = {}): Promise<SetupResult> {
  return setup(ctx, opts);
}
