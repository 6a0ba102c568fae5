import fs from "node:fs/promises";
import path from "node:path";

/**
 * Version from the `package.json` in `packageRoot`, "0.0.0" when it has none.
 */
export async function readToolVersion(packageRoot: string): Promise<string> {
  const raw = await fs.readFile(path.join(packageRoot, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}
