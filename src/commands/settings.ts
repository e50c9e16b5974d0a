import YAML from "yaml";
import { UnknownSpeciesError } from "../errors/UnknownSpeciesError.js";
import { isConfigMap } from "../store/config-store.js";
import { RECORD_KEYS, type ConfigMap, type ConfigValue } from "../types/record.js";
import type { CommandContext } from "./context.js";
import { EXIT, failure, type CommandFailure } from "./exit-codes.js";

export type SettingsResult = { ok: true; key: string; value: ConfigValue | undefined } | CommandFailure;

/** Written only by setup and nuke. */
const MANAGED_KEYS: readonly string[] = [RECORD_KEYS.setupTimestamp, RECORD_KEYS.activationCommand];

/** Scalars are parsed as YAML (`true`, `2000`), anything else is kept as text. */
export function parseSettingValue(raw: string): ConfigValue {
  try {
    const parsed: unknown = YAML.parse(raw);
    const wrapped: { [key: string]: unknown } = { value: parsed };
    if (parsed !== undefined && isConfigMap(wrapped)) return wrapped.value;
  } catch {
    // not YAML: plain text
  }
  return raw;
}

/**
 * Changing the species forgets the previous setup so the next run
 * kickstarts the new back-end.
 */
function applySpecies(map: ConfigMap, species: string): ConfigMap {
  if (map[RECORD_KEYS.speciesKind] === species) return map;
  const next: ConfigMap = { ...map, [RECORD_KEYS.speciesKind]: species };
  for (const key of MANAGED_KEYS) delete next[key];
  return next;
}

export async function setSetting(ctx: CommandContext, key: string, raw: string): Promise<SettingsResult> {
  if (MANAGED_KEYS.includes(key)) {
    return { ok: false, error: `${key} is managed by setup and cannot be set`, exitCode: EXIT.INVALID_ARGS };
  }
  const value = parseSettingValue(raw);

  try {
    const map = await ctx.store.read();
    let next: ConfigMap;
    if (key === RECORD_KEYS.speciesKind) {
      if (typeof value !== "string" || !ctx.registry.has(value)) {
        throw new UnknownSpeciesError(String(value), ctx.registry.kinds());
      }
      next = applySpecies(map, value);
    } else {
      next = { ...map, [key]: value };
    }
    await ctx.store.write(next);
    return { ok: true, key, value };
  } catch (e) {
    return failure(e);
  }
}

export async function unsetSetting(ctx: CommandContext, key: string): Promise<SettingsResult> {
  try {
    const map = await ctx.store.read();
    if (!(key in map)) return { ok: true, key, value: undefined };
    const next: ConfigMap = { ...map };
    delete next[key];
    if (key === RECORD_KEYS.speciesKind) {
      for (const managed of MANAGED_KEYS) delete next[managed];
    }
    await ctx.store.write(next);
    return { ok: true, key, value: undefined };
  } catch (e) {
    return failure(e);
  }
}
