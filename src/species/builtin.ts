import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MissingInstallerArtifactError } from "../errors/MissingInstallerArtifactError.js";
import { MissingSystemDependencyError } from "../errors/MissingSystemDependencyError.js";
import { SpeciesRegistry } from "./registry.js";
import type { Hook, HookContext, SpeciesDefinition, SpeciesFeatures } from "./types.js";

const BASE_ACTIVATE = "source env/bin/activate";
const PY2_ACTIVATE = "source env/envs/py2/bin/activate py2";

/** Single-quote a value for `bash -c`. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function logPath(ctx: HookContext, name: string): string {
  return path.join(ctx.logsDir, name);
}

/** Expand a leading `~` and resolve against the working directory. */
export function expandPath(p: string, cwd: string): string {
  const expanded = p === "~" || p.startsWith("~/") ? path.join(os.homedir(), p.slice(1)) : p;
  return path.resolve(cwd, expanded);
}

function dependencyGroup(ctx: HookContext, group: string): readonly string[] {
  return ctx.species.dependencyFiles[group] ?? [];
}

async function pipInstall(ctx: HookContext, prefix: string): Promise<void> {
  for (const fn of dependencyGroup(ctx, "pip")) {
    ctx.report({ level: "info", code: "STATUS", message: `installing packages via pip from ${fn}` });
    await ctx.shell.run(
      `${ctx.species.activationCommand} && pip install -r ${shellQuote(fn)}`,
      logPath(ctx, `log-${prefix}-pip-${path.basename(fn)}`),
    );
  }
}

const virtualenvKickstart: Hook = async (ctx) => {
  if (!(await ctx.shell.hasCommand("virtualenv"))) {
    throw new MissingSystemDependencyError("virtualenv", "anaconda");
  }
  // re-running virtualenv over an existing env folder is safe
  const flags = ctx.species.features.sandbox ? "" : "--system-site-packages ";
  await ctx.shell.run(`virtualenv ${flags}env`, logPath(ctx, "log-virtualenv"));
};

const virtualenvRefresh: Hook = async (ctx) => {
  await pipInstall(ctx, "virtualenv");
  if (ctx.species.upgrades.length === 0) return;
  const quoted = ctx.species.upgrades.map(shellQuote).join(" ");
  await ctx.shell.run(
    `${ctx.species.activationCommand} && pip install -U ${quoted}`,
    logPath(ctx, "log-virtualenv-pip"),
  );
};

const anacondaKickstart: Hook = async (ctx) => {
  const location = ctx.settings["anaconda_location"];
  if (typeof location !== "string" || location.length === 0) {
    throw new MissingInstallerArtifactError(null, "download anaconda and run `millctl set anaconda_location <path>`");
  }
  const installer = expandPath(location, ctx.cwd);
  if (!fs.existsSync(installer) || !fs.statSync(installer).isFile()) {
    throw new MissingInstallerArtifactError(installer);
  }
  await ctx.shell.run(
    `bash ${shellQuote(installer)} -b -p ${shellQuote(path.join(ctx.cwd, "env"))}`,
    logPath(ctx, "log-anaconda-install"),
  );
  if (ctx.species.features.python2) {
    await ctx.shell.run(`${BASE_ACTIVATE} && conda create python=2 -y -n py2`, logPath(ctx, "log-anaconda-py2"));
  }
};

const anacondaRefresh: Hook = async (ctx) => {
  for (const fn of dependencyGroup(ctx, "conda")) {
    ctx.report({ level: "info", code: "STATUS", message: `installing packages via conda from ${fn}` });
    await ctx.shell.run(
      `${ctx.species.activationCommand} && conda install -y --file ${shellQuote(fn)}`,
      logPath(ctx, `log-anaconda-conda-${path.basename(fn)}`),
    );
  }
  await pipInstall(ctx, "anaconda");
};

function anacondaActivation(features: Readonly<SpeciesFeatures>): string {
  return features.python2 ? PY2_ACTIVATE : BASE_ACTIVATE;
}

const welcomeMessage: Hook = async (ctx) => {
  ctx.report({
    level: "info",
    code: "ENVIRONMENT",
    message: `${ctx.species.kind} is ready; activate with \`${ctx.species.activationCommand}\``,
  });
};

export const BUILTIN_SPECIES: readonly SpeciesDefinition[] = [
  {
    kind: "virtualenv",
    dependencyFiles: { pip: ["mill/requirements_virtualenv.txt"] },
    kickstart: virtualenvKickstart,
    refresh: virtualenvRefresh,
    welcome: welcomeMessage,
    activationCommand: BASE_ACTIVATE,
    features: {},
    upgrades: ["Sphinx>=1.4.4", "numpydoc", "sphinx-better-theme", "beautifulsoup4"],
  },
  {
    // same as virtualenv, without the system site packages
    kind: "virtualenv_sandbox",
    base: "virtualenv",
    override: { features: { sandbox: true } },
  },
  {
    kind: "anaconda",
    dependencyFiles: {
      conda: ["mill/requirements_anaconda_conda.txt"],
      pip: ["mill/requirements_anaconda_pip.txt"],
    },
    kickstart: anacondaKickstart,
    refresh: anacondaRefresh,
    welcome: welcomeMessage,
    // python2 must be chosen when the env is created
    activationCommand: anacondaActivation,
    features: { python2: true },
    upgrades: [],
  },
];

export function createDefaultRegistry(): SpeciesRegistry {
  return SpeciesRegistry.from(BUILTIN_SPECIES);
}
