/**
 * Thrown when an external command exits non-zero.
 *
 * Output is never inspected; the log file at `logPath` holds it.
 */
export class CommandExecutionError extends Error {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly logPath: string;

  constructor(command: string, exitCode: number, logPath: string) {
    super(`CommandExecutionError: \`${command}\` exited with ${exitCode}; see ${logPath}`);
    this.name = "CommandExecutionError";
    this.command = command;
    this.exitCode = exitCode;
    this.logPath = logPath;
    Object.setPrototypeOf(this, CommandExecutionError.prototype);
  }
}
