import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CommandExecutionError } from "../../src/errors/CommandExecutionError.js";
import type { LogEvent, Reporter } from "../../src/log/reporter.js";
import type { ShellExecutor } from "../../src/shell/executor.js";
import type { Hook, SpeciesDefinition } from "../../src/species/types.js";
import type { ConfigStore } from "../../src/store/config-store.js";
import type { ConfigMap } from "../../src/types/record.js";

export class MemoryConfigStore implements ConfigStore {
  readonly location = "memory://factory.yaml";
  readonly writes: ConfigMap[] = [];

  constructor(public map: ConfigMap = {}) {}

  async read(): Promise<ConfigMap> {
    return structuredClone(this.map);
  }

  async write(map: ConfigMap): Promise<void> {
    this.writes.push(structuredClone(map));
    this.map = structuredClone(map);
  }
}

export class RecordingShell implements ShellExecutor {
  readonly commands: Array<{ command: string; logPath: string }> = [];
  readonly missing = new Set<string>();
  failOn: RegExp | null = null;

  async run(command: string, logPath: string): Promise<void> {
    this.commands.push({ command, logPath });
    if (this.failOn?.test(command)) throw new CommandExecutionError(command, 1, logPath);
  }

  async hasCommand(name: string): Promise<boolean> {
    return !this.missing.has(name);
  }
}

export function collectingReporter(): { report: Reporter; events: LogEvent[] } {
  const events: LogEvent[] = [];
  return { report: (e) => events.push(e), events };
}

/** Hooks that append `<kind>:<hook>` to `calls`; `failing` names hooks that throw after recording. */
export function recordingSpecies(calls: string[], failing: ReadonlySet<string> = new Set()): SpeciesDefinition[] {
  const hook =
    (name: string): Hook =>
    async (ctx) => {
      const call = `${ctx.species.kind}:${name}`;
      calls.push(call);
      if (failing.has(call)) throw new CommandExecutionError(call, 1, path.join(ctx.logsDir, `log-${name}`));
    };

  return [
    {
      kind: "alpha",
      dependencyFiles: { pip: ["requirements.txt"], extra: ["extra.txt"] },
      kickstart: hook("kickstart"),
      refresh: hook("refresh"),
      welcome: hook("welcome"),
      activationCommand: "source env/bin/activate",
      features: {},
      upgrades: [],
    },
    {
      kind: "beta",
      base: "alpha",
      override: { kickstart: hook("sandbox-kickstart"), features: { sandbox: true } },
    },
  ];
}

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `millctl-${prefix}-`));
}

/** Create `file` under `dir` with its mtime set to `mtimeMs` (whole seconds). */
export function touch(dir: string, file: string, mtimeMs: number): void {
  const p = path.join(dir, file);
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, "numpy\n");
  fs.utimesSync(p, mtimeMs / 1000, mtimeMs / 1000);
}
