import path from "node:path";
import { UnknownSpeciesError } from "../errors/UnknownSpeciesError.js";
import type { Reporter } from "../log/reporter.js";
import type { ShellExecutor } from "../shell/executor.js";
import type { SpeciesRegistry } from "../species/registry.js";
import type { HookContext, Species } from "../species/types.js";
import { readEnvironmentRecord, withEnvironmentRecord } from "../store/environment-record.js";
import type { ConfigStore } from "../store/config-store.js";
import type { ConfigMap, EnvironmentRecord } from "../types/record.js";
import { nextTimestamp, systemClock, type Clock } from "./clock.js";
import { ensureScaffold, REQUIRED_FOLDERS } from "./scaffold.js";
import { checkStaleness, readMtime, type MtimeReader } from "./staleness.js";
import {
  type ProvisionAction,
  type ProvisionEvent,
  type ProvisionState,
  initialState,
  nextState,
  planRun,
} from "./state-machine.js";

export type ProvisionerDeps = {
  cwd: string;
  store: ConfigStore;
  registry: SpeciesRegistry;
  shell: ShellExecutor;
  report: Reporter;
  requiredFolders?: readonly string[];
  /** Relative to cwd. */
  logsDir?: string;
  clock?: Clock;
  readMtime?: MtimeReader;
};

export type ProvisionOptions = {
  /** Refresh even when no dependency file changed. */
  refresh?: boolean;
};

export type ProvisionResult = {
  state: ProvisionState;
  species: string;
  action: ProvisionAction;
  changed: string[];
  record: EnvironmentRecord;
};

/**
 * Provisioner — drives one environment through its life-cycle.
 *
 * load record → resolve species → kickstart / refresh / nothing → register → welcome.
 * The record is persisted only by registration, after every hook of the run
 * succeeded; any error propagates with the stored state untouched.
 * Runs against the same directory must be serialized by the caller.
 */
export class Provisioner {
  private readonly deps: Required<Omit<ProvisionerDeps, "logsDir">> & { logsDir: string };
  private current: ProvisionState = "uninitialized";

  constructor(deps: ProvisionerDeps) {
    this.deps = {
      requiredFolders: REQUIRED_FOLDERS,
      clock: systemClock,
      readMtime,
      ...deps,
      logsDir: deps.logsDir ?? "logs",
    };
  }

  get state(): ProvisionState {
    return this.current;
  }

  async run(opts: ProvisionOptions = {}): Promise<ProvisionResult> {
    const { cwd, store, registry, report, clock } = this.deps;

    const created = ensureScaffold(cwd, this.deps.requiredFolders);
    if (created.length > 0) {
      report({ level: "info", code: "STATUS", message: `created ${created.join(", ")}`, data: { created } });
    }

    const map = await store.read();
    const record = readEnvironmentRecord(map, store.location);
    if (record.speciesKind === null) throw new UnknownSpeciesError(null, registry.kinds());

    const species = registry.lookup(record.speciesKind);
    this.current = initialState(record);

    let changed: string[] = [];
    if (record.setupTimestamp !== null) {
      const staleness = await checkStaleness(species, record.setupTimestamp, cwd, this.deps.readMtime);
      changed = staleness.changed;
      if (staleness.stale) {
        report({
          level: "info",
          code: "STATUS",
          message: `dependency files changed: ${changed.join(", ")}`,
          data: { changed },
        });
      }
    }

    const action = planRun({
      initialized: record.setupTimestamp !== null,
      stale: changed.length > 0,
      forced: opts.refresh === true,
    });

    const ctx = this.hookContext(species, map);
    const startedAt = clock();
    let finalRecord = record;

    switch (action) {
      case "kickstart":
        await species.kickstart(ctx);
        this.transition("kickstart_succeeded");
        await species.refresh(ctx);
        finalRecord = await this.register(map, record, species);
        break;
      case "refresh":
        this.transition("refresh_started");
        await species.refresh(ctx);
        finalRecord = await this.register(map, record, species);
        break;
      case "none":
        break;
    }

    if (action !== "none") {
      const minutes = (clock() - startedAt) / 60_000;
      report({ level: "info", code: "NOTE", message: `setup took ${minutes.toFixed(1)} minutes` });
    }

    if (species.welcome) await species.welcome(ctx);

    return { state: this.current, species: species.kind, action, changed, record: finalRecord };
  }

  /** The only write of a run. */
  private async register(map: ConfigMap, record: EnvironmentRecord, species: Species): Promise<EnvironmentRecord> {
    const next: EnvironmentRecord = {
      speciesKind: record.speciesKind,
      setupTimestamp: nextTimestamp(this.deps.clock, record.setupTimestamp),
      activationCommand: species.activationCommand,
    };
    await this.deps.store.write(withEnvironmentRecord(map, next));
    this.transition("registered");
    return next;
  }

  private transition(event: ProvisionEvent): void {
    this.current = nextState(this.current, event);
  }

  private hookContext(species: Species, settings: ConfigMap): HookContext {
    const { cwd, shell, report, logsDir } = this.deps;
    return { species, cwd, logsDir: path.join(cwd, logsDir), shell, settings: Object.freeze({ ...settings }), report };
  }
}
