/**
 * Thrown when a file the provisioning depends on (an installer archive,
 * a requirements list) is not on disk. `path` is null when the setting
 * that should name the file is unset.
 */
export class MissingInstallerArtifactError extends Error {
  public readonly path: string | null;

  constructor(filePath: string | null, hint?: string) {
    const what = filePath === null ? "installer location is not configured" : `cannot find ${filePath}`;
    super(`MissingInstallerArtifactError: ${what}${hint ? ` (${hint})` : ""}`);
    this.name = "MissingInstallerArtifactError";
    this.path = filePath;
    Object.setPrototypeOf(this, MissingInstallerArtifactError.prototype);
  }
}
