import fs from "node:fs";
import path from "node:path";

// Sources run from backend/src, the compiled server from dist/ beside backend/.
const MODULE_PARENT_DIR = path.resolve(__dirname, "..");

let cachedBackendRootDir: string | null = null;

export function resolveBackendRootDir(): string {
  if (cachedBackendRootDir) return cachedBackendRootDir;

  const siblingDataDir = path.join(MODULE_PARENT_DIR, "data");
  cachedBackendRootDir = fs.existsSync(siblingDataDir) ? MODULE_PARENT_DIR : path.join(MODULE_PARENT_DIR, "backend");
  return cachedBackendRootDir;
}

export function resolveBackendPath(...parts: string[]): string {
  return path.join(resolveBackendRootDir(), ...parts);
}

export function resolveBackendDataFilePath(filename: string): string {
  return resolveBackendPath("data", filename);
}
