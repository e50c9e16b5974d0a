import { ConfigStoreError } from "../errors/ConfigStoreError.js";
import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import { RECORD_KEYS, type ConfigMap, type EnvironmentRecord } from "../types/record.js";

const RECORD_SCHEMA = {
  type: "object",
  properties: {
    [RECORD_KEYS.speciesKind]: { type: ["string", "null"] },
    [RECORD_KEYS.setupTimestamp]: { type: ["integer", "null"], minimum: 0 },
    [RECORD_KEYS.activationCommand]: { type: ["string", "null"] },
  },
};

let compiled: AjvValidateFn | null = null;

function pickString(map: ConfigMap, key: string): string | null {
  const value = map[key];
  return typeof value === "string" ? value : null;
}

function pickNumber(map: ConfigMap, key: string): number | null {
  const value = map[key];
  return typeof value === "number" ? value : null;
}

/** Extract the environment record from a config map; absent keys read as null. */
export function readEnvironmentRecord(map: ConfigMap, location: string): EnvironmentRecord {
  compiled ??= loadAjv().compile(RECORD_SCHEMA);
  if (!compiled(map)) {
    throw new ConfigStoreError(location, `invalid environment record: ${loadAjv().errorsText(compiled.errors)}`);
  }
  return {
    speciesKind: pickString(map, RECORD_KEYS.speciesKind),
    setupTimestamp: pickNumber(map, RECORD_KEYS.setupTimestamp),
    activationCommand: pickString(map, RECORD_KEYS.activationCommand),
  };
}

/** Return a copy of `map` carrying `record`. Null fields remove their key. */
export function withEnvironmentRecord(map: ConfigMap, record: EnvironmentRecord): ConfigMap {
  const next: ConfigMap = { ...map };
  const entries: Array<[string, string | number | null]> = [
    [RECORD_KEYS.speciesKind, record.speciesKind],
    [RECORD_KEYS.setupTimestamp, record.setupTimestamp],
    [RECORD_KEYS.activationCommand, record.activationCommand],
  ];
  for (const [key, value] of entries) {
    if (value === null) delete next[key];
    else next[key] = value;
  }
  return next;
}

export const EMPTY_RECORD: EnvironmentRecord = Object.freeze({
  speciesKind: null,
  setupTimestamp: null,
  activationCommand: null,
});
