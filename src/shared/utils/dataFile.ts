import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { join } from "path";

// src/shared/utils and dist/shared/utils both sit three levels below the root
const DATA_DIR = fileURLToPath(new URL("../../../data/", import.meta.url));

export function readDataFile(relativePath: string): unknown {
  const content = readFileSync(join(DATA_DIR, relativePath), "utf-8");
  return JSON.parse(content);
}
