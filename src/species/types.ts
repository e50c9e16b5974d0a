import type { Reporter } from "../log/reporter.js";
import type { ShellExecutor } from "../shell/executor.js";
import type { ConfigMap } from "../types/record.js";

export type SpeciesFeatures = {
  /** Create a python=2 env named py2 at kickstart and activate it afterwards. */
  python2?: boolean;
  /** Keep system site packages out of the env. */
  sandbox?: boolean;
};

/** Everything a hook may touch. Hooks never see the config store. */
export type HookContext = {
  species: Species;
  cwd: string;
  logsDir: string;
  shell: ShellExecutor;
  settings: Readonly<ConfigMap>;
  report: Reporter;
};

export type Hook = (ctx: HookContext) => Promise<void>;

/** A resolved environment back-end. Values handed out by the registry are frozen. */
export type Species = {
  readonly kind: string;
  /** Named dependency-file lists, paths relative to the working directory. */
  readonly dependencyFiles: Readonly<Record<string, readonly string[]>>;
  readonly kickstart: Hook;
  readonly refresh: Hook;
  readonly welcome?: Hook;
  readonly activationCommand: string;
  readonly features: Readonly<SpeciesFeatures>;
  /** Packages force-upgraded at the end of a refresh. */
  readonly upgrades: readonly string[];
};

/** A fixed command, or one chosen from the resolved species' features. */
export type ActivationCommand = string | ((features: Readonly<SpeciesFeatures>) => string);

export type SpeciesFields = Omit<Species, "kind" | "activationCommand"> & {
  activationCommand: ActivationCommand;
};

export type BaseSpeciesDefinition = { kind: string; base?: undefined } & SpeciesFields;

export type DerivedSpeciesDefinition = {
  kind: string;
  base: string;
  override: Partial<SpeciesFields>;
};

export type SpeciesDefinition = BaseSpeciesDefinition | DerivedSpeciesDefinition;
