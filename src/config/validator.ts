import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { MillConfig } from "../types/config.js";

const PATH_SEGMENT = { type: "string", minLength: 1 };

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "config_file", "required_folders", "logs_dir", "nuke"],
  properties: {
    schema_version: { type: "string", pattern: "^\\d+\\.\\d+\\.\\d+$" },
    config_file: PATH_SEGMENT,
    required_folders: { type: "array", items: PATH_SEGMENT },
    logs_dir: PATH_SEGMENT,
    nuke: {
      type: "object",
      required: ["directories"],
      properties: {
        directories: { type: "array", items: PATH_SEGMENT },
      },
    },
    renew: {
      type: "object",
      additionalProperties: {
        type: "object",
        required: ["test_command"],
        properties: {
          settings: { type: "object", additionalProperties: { type: "string" } },
          test_command: { type: "string", minLength: 1 },
        },
        additionalProperties: false,
      },
    },
  },
};

export type ConfigValidationResult = {
  valid: boolean;
  errors: string | null;
};

let compiled: AjvValidateFn | null = null;

function validator(): AjvValidateFn {
  compiled ??= loadAjv().compile(CONFIG_SCHEMA);
  return compiled;
}

export function isMillConfig(config: unknown): config is MillConfig {
  return validator()(config);
}

/** Validate loaded tool settings against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const validate = validator();
  const valid = validate(config);
  return {
    valid,
    errors: valid ? null : loadAjv().errorsText(validate.errors),
  };
}
