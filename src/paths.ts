import fs from "node:fs/promises";
import path from "node:path";

const FILE_NAME_PATTERN = /^[A-Za-z0-9._+=@-]+$/;

/** Returns why `name` cannot be used as a bare log file name, or undefined when it can. */
export function artifactFileNameProblem(name: string): string | undefined {
  if (name.length === 0) {
    return "is empty";
  }
  if (name === "." || name === ".." || name.includes("..")) {
    return "must not contain '..'";
  }
  if (!FILE_NAME_PATTERN.test(name)) {
    return "must be a plain file name (letters, digits and ._+=@- only)";
  }
  return undefined;
}

export function isPathInside(base: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(base), path.resolve(candidate));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Where the entry point writes its log: `logDir/name` when a log dir is set,
 * otherwise `name` inside the launch working directory.
 */
export function resolveArtifactPath(workDir: string, artifactName: string, logDir?: string): string {
  const base = path.resolve(workDir);
  const dir = logDir ? path.resolve(base, logDir) : base;
  const resolved = path.join(dir, artifactName);
  if (!isPathInside(dir, resolved)) {
    throw new Error(`Artifact path must stay inside ${dir}: ${artifactName}`);
  }
  return resolved;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
