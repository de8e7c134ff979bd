import type { Stats } from "node:fs";
import { mkdir, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { FileExistsError, InvalidArgumentError, NotFoundError } from "../errors/tool-errors.js";
import { resolveInside } from "../process/security.js";

export type WriteTestFileResult = {
  path: string;
  bytes: number;
  created: boolean;
};

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Persist test code written by the orchestrator under `projectPath`.
 * Nothing here generates tests; the content is written verbatim.
 */
export async function writeTestFile(
  projectPath: string,
  relativePath: string,
  content: string,
  overwrite = false,
): Promise<WriteTestFileResult> {
  const root = path.resolve(projectPath);
  let rootStat: Stats;
  try {
    rootStat = await stat(root);
  } catch {
    throw new NotFoundError(`Project path not found: ${projectPath}`, { path: projectPath });
  }
  if (!rootStat.isDirectory()) {
    throw new NotFoundError(`Project path is not a directory: ${projectPath}`, { path: projectPath });
  }

  const target = resolveInside(root, relativePath);
  if (!target) {
    throw new InvalidArgumentError(`relative_path must stay inside the project: ${relativePath}`);
  }

  const existed = await exists(target);
  if (existed && !overwrite) {
    throw new FileExistsError(path.relative(root, target));
  }

  await mkdir(path.dirname(target), { recursive: true });
  try {
    await writeFile(target, content, { encoding: "utf8", flag: overwrite ? "w" : "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new FileExistsError(path.relative(root, target));
    }
    throw err;
  }

  return { path: target, bytes: Buffer.byteLength(content, "utf8"), created: !existed };
}
