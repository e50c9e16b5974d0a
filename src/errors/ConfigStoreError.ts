/**
 * Thrown when the factory config file cannot be read, parsed, validated
 * or written.
 */
export class ConfigStoreError extends Error {
  public readonly path: string;
  public override readonly cause: unknown;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`ConfigStoreError: ${filePath}: ${reason}`);
    this.name = "ConfigStoreError";
    this.path = filePath;
    this.cause = cause;
    Object.setPrototypeOf(this, ConfigStoreError.prototype);
  }
}
