import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { MillConfig } from "../types/config.js";
import { isMillConfig, validateConfig } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

type Layer = Record<string, unknown>;

function isLayer(value: unknown): value is Layer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isLayer(val) && isLayer(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isLayer(parsed)) throw new Error(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

/**
 * Apply MILL_ prefixed environment variable overrides to top-level keys.
 * A comma-separated value replaces a list-valued key.
 */
function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv): Layer {
  const prefix = "MILL_";
  const result: Layer = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined) continue;
    // MILL_CONFIG_FILE → config_file
    const configKey = key.slice(prefix.length).toLowerCase();
    result[configKey] = Array.isArray(result[configKey])
      ? value.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
      : value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← MILL_* environment variables.
 *
 * @param envName - Optional override layer, e.g. "ci" loads `config/ci.yaml`.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): MillConfig {
  const dir = configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  merged = applyEnvOverrides(merged, env);

  if (!isMillConfig(merged)) {
    throw new Error(`Invalid millctl config in ${dir}: ${validateConfig(merged).errors ?? "unknown error"}`);
  }
  return merged;
}
