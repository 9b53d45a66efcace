import fs from "fs";
import path from "path";

/**
 * key=value 形式の行を1行だけ持つように content を書き換える。
 * 既存の行はその位置で置き換え、重複する後続行は取り除く。
 */
export const upsertEnvValue = (
  content: string,
  key: string,
  value: string
): string => {
  if (/[\r\n]/.test(value)) {
    throw new Error(`${key} value must not contain line breaks`);
  }

  const prefix = `${key}=`;
  const entry = `${prefix}${value}`;
  const hasTrailingNewline = content.endsWith("\n");
  const body = hasTrailingNewline ? content.slice(0, -1) : content;
  const lines = body === "" ? [] : body.split("\n");

  let found = false;
  const next: string[] = [];
  for (const line of lines) {
    if (!line.startsWith(prefix)) {
      next.push(line);
      continue;
    }
    if (found) continue;
    found = true;
    // CRLF のファイルでは行末の \r を残す
    next.push(line.endsWith("\r") ? `${entry}\r` : entry);
  }

  if (!found) {
    const crlf = next.some((line) => line.endsWith("\r"));
    const last = next.length - 1;
    if (crlf && last >= 0 && !next[last].endsWith("\r")) {
      next[last] = `${next[last]}\r`;
    }
    next.push(crlf ? `${entry}\r` : entry);
    return `${next.join("\n")}\n`;
  }

  return hasTrailingNewline ? `${next.join("\n")}\n` : next.join("\n");
};

export type EnsureEnvFileOptions = {
  dir: string;
  envFile: string;
  template: string;
  key: string;
  value: string;
};

export type EnsureEnvFileResult = {
  path: string;
  created: boolean;
  changed: boolean;
  fromTemplate: boolean;
};

export const ensureEnvFile = (
  options: EnsureEnvFileOptions
): EnsureEnvFileResult => {
  const envPath = path.join(options.dir, options.envFile);
  const templatePath = path.join(options.dir, options.template);

  let created = false;
  let fromTemplate = false;
  let current = "";

  if (fs.existsSync(envPath)) {
    current = fs.readFileSync(envPath, "utf-8");
  } else {
    created = true;
    if (fs.existsSync(templatePath)) {
      fromTemplate = true;
      current = fs.readFileSync(templatePath, "utf-8");
    }
  }

  const next = upsertEnvValue(current, options.key, options.value);
  const changed = created || next !== current;

  if (changed) {
    fs.mkdirSync(options.dir, { recursive: true });
    fs.writeFileSync(envPath, next, "utf-8");
  }

  return { path: envPath, created, changed, fromTemplate };
};
