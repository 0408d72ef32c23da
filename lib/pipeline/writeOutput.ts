import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

/** Write `value` as indented JSON to `dir/fileName`, creating `dir` if needed. Returns the path. */
export function writeJsonOutput(dir: string, fileName: string, value: unknown): string {
  mkdirSync(dir, { recursive: true });
  const outFile = join(dir, fileName);
  writeFileSync(outFile, JSON.stringify(value, null, 2), "utf-8");
  return outFile;
}
