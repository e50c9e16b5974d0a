import fs from "node:fs";
import path from "node:path";

export const REQUIRED_FOLDERS = ["logs", "connections"] as const;

/** Create any missing required folder under `cwd`. Returns the ones created. */
export function ensureScaffold(cwd: string, folders: readonly string[] = REQUIRED_FOLDERS): string[] {
  const created: string[] = [];
  for (const name of folders) {
    const dir = path.join(cwd, name);
    if (fs.existsSync(dir)) continue;
    fs.mkdirSync(dir, { recursive: true });
    created.push(name);
  }
  return created;
}
