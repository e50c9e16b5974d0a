/**
 * Thrown by a kickstart hook when an external tool it needs is not on PATH.
 * Carries the species that can be used instead.
 */
export class MissingSystemDependencyError extends Error {
  public readonly tool: string;
  public readonly alternative: string;

  constructor(tool: string, alternative: string) {
    super(
      `MissingSystemDependencyError: failed to create the environment: missing ${tool}. ` +
        `Install it, or switch species with \`millctl set species ${alternative}\``,
    );
    this.name = "MissingSystemDependencyError";
    this.tool = tool;
    this.alternative = alternative;
    Object.setPrototypeOf(this, MissingSystemDependencyError.prototype);
  }
}
