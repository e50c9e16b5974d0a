import { mkdir, open, readFile, rename, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import YAML from "yaml";
import { ConfigStoreError } from "../errors/ConfigStoreError.js";
import type { ConfigMap, ConfigValue } from "../types/record.js";

/**
 * Durable key/value persistence for the factory config.
 * `write` replaces the whole map and throws on failure.
 */
export interface ConfigStore {
  readonly location: string;
  read(): Promise<ConfigMap>;
  write(map: ConfigMap): Promise<void>;
}

function isConfigValue(value: unknown): value is ConfigValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      return Array.isArray(value) ? value.every(isConfigValue) : isConfigMap(value);
    default:
      return false;
  }
}

export function isConfigMap(value: unknown): value is ConfigMap {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every(isConfigValue);
}

/** Factory config kept as a YAML mapping in a single file. A missing file reads as `{}`. */
export class YamlConfigStore implements ConfigStore {
  constructor(public readonly location: string) {}

  async read(): Promise<ConfigMap> {
    let raw: string;
    try {
      raw = await readFile(this.location, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return {};
      throw new ConfigStoreError(this.location, e);
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (e) {
      throw new ConfigStoreError(this.location, e);
    }
    if (parsed === null || parsed === undefined) return {};
    if (!isConfigMap(parsed)) {
      throw new ConfigStoreError(this.location, "expected a mapping of plain values");
    }
    return parsed;
  }

  async write(map: ConfigMap): Promise<void> {
    try {
      await atomicWriteYaml(this.location, map);
    } catch (e) {
      throw new ConfigStoreError(this.location, e);
    }
  }
}

export async function atomicWriteYaml(path: string, data: ConfigMap): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;
  const payload = YAML.stringify(data);

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}
