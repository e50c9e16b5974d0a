/** Keys and values held in the factory config file. */
export type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };

export type ConfigMap = { [key: string]: ConfigValue };

/** Provisioning state of the current working directory. */
export type EnvironmentRecord = {
  speciesKind: string | null;
  /** Unix epoch milliseconds of the last successful registration. */
  setupTimestamp: number | null;
  activationCommand: string | null;
};

export const RECORD_KEYS = {
  speciesKind: "species",
  setupTimestamp: "setup_timestamp",
  activationCommand: "activation_command",
} as const;
