import { stat } from "node:fs/promises";
import path from "node:path";
import { MissingInstallerArtifactError } from "../errors/MissingInstallerArtifactError.js";
import type { Species } from "../species/types.js";

/** Modification time in epoch milliseconds, or null when the file does not exist. */
export type MtimeReader = (filePath: string) => Promise<number | null>;

export type StalenessReport = {
  stale: boolean;
  /** Dependency files newer than the stored timestamp, in declaration order. */
  changed: string[];
};

export const readMtime: MtimeReader = async (filePath) => {
  try {
    const s = await stat(filePath);
    return Math.floor(s.mtimeMs);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
};

/**
 * Compare every file of every dependency list against `setupTimestamp`.
 * One newer file makes the whole environment stale.
 */
export async function checkStaleness(
  species: Species,
  setupTimestamp: number,
  cwd: string,
  readTime: MtimeReader = readMtime,
): Promise<StalenessReport> {
  const changed: string[] = [];
  for (const files of Object.values(species.dependencyFiles)) {
    for (const file of files) {
      const mtime = await readTime(path.resolve(cwd, file));
      if (mtime === null) throw new MissingInstallerArtifactError(file, `dependency list of species ${species.kind}`);
      if (mtime > setupTimestamp && !changed.includes(file)) changed.push(file);
    }
  }
  return { stale: changed.length > 0, changed };
}
