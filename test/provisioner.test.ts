import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import { Provisioner, type ProvisionerDeps } from "../src/core/provisioner.js";
import type { MtimeReader } from "../src/core/staleness.js";
import { CommandExecutionError } from "../src/errors/CommandExecutionError.js";
import { MissingInstallerArtifactError } from "../src/errors/MissingInstallerArtifactError.js";
import { UnknownSpeciesError } from "../src/errors/UnknownSpeciesError.js";
import { SpeciesRegistry } from "../src/species/registry.js";
import type { ConfigMap } from "../src/types/record.js";
import {
  MemoryConfigStore,
  RecordingShell,
  collectingReporter,
  makeTmpDir,
  recordingSpecies,
  touch,
} from "./helpers/fakes.js";

const T0 = 1_700_000_000_000;

describe("Provisioner", () => {
  let cwd: string;
  let calls: string[];

  beforeEach(() => {
    cwd = makeTmpDir("prov");
    calls = [];
    touch(cwd, "requirements.txt", T0 - 60_000);
    touch(cwd, "extra.txt", T0 - 60_000);
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function make(
    map: ConfigMap,
    opts: { failing?: string[]; clock?: () => number; readMtime?: MtimeReader } = {},
  ): { prov: Provisioner; store: MemoryConfigStore; events: ReturnType<typeof collectingReporter>["events"] } {
    const store = new MemoryConfigStore(map);
    const { report, events } = collectingReporter();
    const deps: ProvisionerDeps = {
      cwd,
      store,
      registry: SpeciesRegistry.from(recordingSpecies(calls, new Set(opts.failing ?? []))),
      shell: new RecordingShell(),
      report,
      clock: opts.clock ?? (() => T0 + 5_000),
    };
    if (opts.readMtime) deps.readMtime = opts.readMtime;
    return { prov: new Provisioner(deps), store, events };
  }

  it.each(["alpha", "beta"])("first run of %s kickstarts, refreshes, then registers once", async (kind) => {
    const { prov, store } = make({ species: kind });
    const result = await prov.run();

    const kickstart = kind === "beta" ? "beta:sandbox-kickstart" : "alpha:kickstart";
    expect(calls).toEqual([kickstart, `${kind}:refresh`, `${kind}:welcome`]);
    expect(store.writes).toHaveLength(1);
    expect(store.map).toEqual({
      species: kind,
      setup_timestamp: T0 + 5_000,
      activation_command: "source env/bin/activate",
    });
    expect(result.action).toBe("kickstart");
    expect(result.state).toBe("ready");
    expect(prov.state).toBe("ready");
  });

  it("performs no provisioning hook when fresh and not forced", async () => {
    const first = make({ species: "alpha" });
    await first.prov.run();
    calls.length = 0;

    const second = make(first.store.map);
    const result = await second.prov.run();

    expect(calls).toEqual(["alpha:welcome"]);
    expect(second.store.writes).toHaveLength(0);
    expect(result.action).toBe("none");
    expect(result.state).toBe("ready");
  });

  it("refreshes when a dependency file is newer than the stored timestamp (example A)", async () => {
    const { prov, store, events } = make(
      { species: "alpha", setup_timestamp: T0, activation_command: "source env/bin/activate" },
      { clock: () => T0 + 1, readMtime: async (p) => (p.endsWith("extra.txt") ? T0 + 1 : T0 - 10) },
    );
    const result = await prov.run();

    expect(events).toContainEqual({
      level: "info",
      code: "STATUS",
      message: "dependency files changed: extra.txt",
      data: { changed: ["extra.txt"] },
    });
    expect(calls).toEqual(["alpha:refresh", "alpha:welcome"]);
    expect(result.action).toBe("refresh");
    expect(result.changed).toEqual(["extra.txt"]);
    expect(store.map["setup_timestamp"]).toBe(T0 + 1);
  });

  it("reports nothing about the scaffold once it exists", async () => {
    fs.mkdirSync(`${cwd}/logs`);
    fs.mkdirSync(`${cwd}/connections`);
    const { prov, events } = make({ species: "alpha" });
    await prov.run();

    expect(events.filter((e) => e.message.startsWith("created"))).toEqual([]);
  });

  it("does not refresh when every dependency file is at or before the timestamp", async () => {
    touch(cwd, "requirements.txt", T0);
    const { prov } = make({ species: "alpha", setup_timestamp: T0 });
    const result = await prov.run();

    expect(result.action).toBe("none");
    expect(calls).toEqual(["alpha:welcome"]);
  });

  it("detects a newer file on disk", async () => {
    touch(cwd, "requirements.txt", T0 + 2_000);
    const { prov } = make({ species: "alpha", setup_timestamp: T0 });
    const result = await prov.run();

    expect(result.action).toBe("refresh");
    expect(result.changed).toEqual(["requirements.txt"]);
  });

  it("runs exactly one refresh when forced with nothing changed (example C)", async () => {
    const { prov, store } = make({ species: "alpha", setup_timestamp: T0 });
    const result = await prov.run({ refresh: true });

    expect(calls.filter((c) => c === "alpha:refresh")).toHaveLength(1);
    expect(calls).not.toContain("alpha:kickstart");
    expect(result.action).toBe("refresh");
    expect(store.writes).toHaveLength(1);
  });

  it("raises UnknownSpeciesError with no species and only creates the scaffold (example B)", async () => {
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.mkdirSync(cwd);
    const { prov, store, events } = make({});

    await expect(prov.run()).rejects.toBeInstanceOf(UnknownSpeciesError);
    expect(events).toEqual([
      {
        level: "info",
        code: "STATUS",
        message: "created logs, connections",
        data: { created: ["logs", "connections"] },
      },
    ]);
    expect(calls).toEqual([]);
    expect(store.writes).toEqual([]);
    expect(fs.readdirSync(cwd).sort()).toEqual(["connections", "logs"]);
  });

  it("raises UnknownSpeciesError for a species the registry lacks", async () => {
    const { prov } = make({ species: "zeta" });
    const err = await prov.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnknownSpeciesError);
    expect(err instanceof UnknownSpeciesError && err.kind).toBe("zeta");
    expect(calls).toEqual([]);
  });

  it("raises UnknownSpeciesError for an empty species", async () => {
    const { prov, store } = make({ species: "" });
    const err = await prov.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnknownSpeciesError);
    expect(err instanceof UnknownSpeciesError && err.kind).toBe("");
    expect(calls).toEqual([]);
    expect(store.writes).toEqual([]);
  });

  it("stops after a failed kickstart without refreshing or registering", async () => {
    const { prov, store } = make({ species: "alpha" }, { failing: ["alpha:kickstart"] });

    await expect(prov.run()).rejects.toBeInstanceOf(CommandExecutionError);
    expect(calls).toEqual(["alpha:kickstart"]);
    expect(store.writes).toEqual([]);
    expect(prov.state).toBe("uninitialized");
  });

  it("retries kickstart from scratch on the run after a failure", async () => {
    const failing = make({ species: "alpha" }, { failing: ["alpha:kickstart"] });
    await failing.prov.run().catch(() => undefined);
    calls.length = 0;

    const retry = make(failing.store.map);
    const result = await retry.prov.run();

    expect(calls).toEqual(["alpha:kickstart", "alpha:refresh", "alpha:welcome"]);
    expect(result.action).toBe("kickstart");
  });

  it("leaves the timestamp untouched when the first refresh fails", async () => {
    const { prov, store } = make({ species: "alpha" }, { failing: ["alpha:refresh"] });

    await expect(prov.run()).rejects.toBeInstanceOf(CommandExecutionError);
    expect(calls).toEqual(["alpha:kickstart", "alpha:refresh"]);
    expect(store.map["setup_timestamp"]).toBeUndefined();
    expect(prov.state).toBe("kickstarted");
  });

  it("leaves the timestamp untouched when a later refresh fails", async () => {
    const { prov, store } = make(
      { species: "alpha", setup_timestamp: T0 },
      { failing: ["alpha:refresh"] },
    );

    await expect(prov.run({ refresh: true })).rejects.toBeInstanceOf(CommandExecutionError);
    expect(store.map["setup_timestamp"]).toBe(T0);
    expect(store.writes).toEqual([]);
    expect(prov.state).toBe("refreshing");
  });

  it("keeps timestamps increasing when the clock goes backwards", async () => {
    const { prov, store } = make({ species: "alpha", setup_timestamp: T0 }, { clock: () => T0 - 100_000 });
    await prov.run({ refresh: true });

    expect(store.map["setup_timestamp"]).toBe(T0 + 1);
  });

  it("preserves unrelated config keys when registering", async () => {
    const { prov, store } = make({ species: "alpha", anaconda_location: "~/libs/installer.sh" });
    await prov.run();

    expect(store.map["anaconda_location"]).toBe("~/libs/installer.sh");
  });

  it("fails before any hook when a dependency file is missing", async () => {
    fs.rmSync(`${cwd}/extra.txt`);
    const { prov, store } = make({ species: "alpha", setup_timestamp: T0 });

    await expect(prov.run()).rejects.toBeInstanceOf(MissingInstallerArtifactError);
    expect(calls).toEqual([]);
    expect(store.writes).toEqual([]);
  });

  it("reports how long provisioning took", async () => {
    const { prov, events } = make({ species: "alpha" });
    await prov.run();

    expect(events).toContainEqual({ level: "info", code: "NOTE", message: "setup took 0.0 minutes" });
  });
});
