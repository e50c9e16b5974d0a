/** Tool settings — layered config system (base.yaml ← <env>.yaml ← MILL_* vars). */
export type OutputFormat = "human" | "jsonl";

export type NukeConfig = {
  directories: string[];
};

/** A scripted nuke → set species → setup → test cycle for one species. */
export type RenewWorkflow = {
  settings?: Record<string, string>;
  test_command: string;
};

export type MillConfig = {
  schema_version: string;
  config_file: string;
  required_folders: string[];
  logs_dir: string;
  nuke: NukeConfig;
  renew?: Record<string, RenewWorkflow>;
};
