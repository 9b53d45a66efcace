import fs from "fs";
import path from "path";

export const DEFAULT_ROOT_MARKER = "docker-compose.yml";

const SOURCE_DIRS = new Set(["src", "scripts"]);

const isFile = (filePath: string): boolean => {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
};

/**
 * startDir から親ディレクトリへ遡り、marker を含む最初のディレクトリを返す。
 * 見つからない場合は startDir の親ディレクトリを返す。
 */
export const findRepoRoot = (
  startDir: string,
  marker: string = DEFAULT_ROOT_MARKER
): string => {
  const start = path.resolve(startDir);
  let dir = start;

  // ファイルシステムのルート自体は探索しない
  while (path.dirname(dir) !== dir) {
    if (isFile(path.join(dir, marker))) {
      return dir;
    }
    dir = path.dirname(dir);
  }

  return path.dirname(start);
};

/**
 * 実行中モジュールのディレクトリからツール本体のディレクトリを求める。
 * dist/src, dist/scripts, src, scripts のいずれから起動しても同じ結果になる。
 */
export const resolveToolDir = (moduleDir: string): string => {
  let dir = path.resolve(moduleDir);
  if (SOURCE_DIRS.has(path.basename(dir))) dir = path.dirname(dir);
  if (path.basename(dir) === "dist") dir = path.dirname(dir);
  return dir;
};

export const resolveRepoRoot = (
  startDir: string,
  env: Record<string, string | undefined> = process.env,
  marker: string = DEFAULT_ROOT_MARKER
): string => {
  const override = env.PROVISION_ROOT?.trim();
  if (override) {
    return path.resolve(override);
  }
  return findRepoRoot(startDir, marker);
};
