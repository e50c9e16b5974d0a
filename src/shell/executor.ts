import { execFile, spawn } from "node:child_process";
import { mkdir, open } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { CommandExecutionError } from "../errors/CommandExecutionError.js";

const pExecFile = promisify(execFile);

const COMMAND_NAME = /^[A-Za-z0-9._+-]+$/;

/**
 * Runs external commands for species hooks. `run` resolves on exit status 0
 * and rejects with CommandExecutionError otherwise; output goes to the log only.
 */
export interface ShellExecutor {
  run(command: string, logPath: string): Promise<void>;
  hasCommand(name: string): Promise<boolean>;
}

/** Runs each command with `bash -c` so hooks can `source` activation scripts. */
export class BashExecutor implements ShellExecutor {
  constructor(
    private readonly cwd: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async run(command: string, logPath: string): Promise<void> {
    const target = path.resolve(this.cwd, logPath);
    await mkdir(path.dirname(target), { recursive: true });

    const log = await open(target, "w");
    try {
      const exitCode = await new Promise<number>((resolve, reject) => {
        const child = spawn("bash", ["-c", command], {
          cwd: this.cwd,
          env: this.env,
          stdio: ["ignore", log.fd, log.fd],
        });
        child.once("error", reject);
        // code is null when the child was killed by a signal
        child.once("close", (code) => resolve(code ?? 1));
      });
      if (exitCode !== 0) throw new CommandExecutionError(command, exitCode, logPath);
    } finally {
      await log.close();
    }
  }

  async hasCommand(name: string): Promise<boolean> {
    if (!COMMAND_NAME.test(name)) return false;
    try {
      await pExecFile("bash", ["-c", `command -v ${name}`], { cwd: this.cwd, env: this.env });
      return true;
    } catch (e) {
      // `command -v` exits 1 when the name is not found
      if (e instanceof Error && "code" in e && e.code === 1) return false;
      throw e;
    }
  }
}
