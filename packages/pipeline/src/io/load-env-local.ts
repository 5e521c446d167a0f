import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { findProjectRoot } from "./repo-paths.js";

export function loadEnvLocal(
  startDirectory: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const envLocalPath = path.join(findProjectRoot(startDirectory), ".env.local");
  if (!existsSync(envLocalPath)) {
    return null;
  }

  const parsed = parseDotEnv(readFileSync(envLocalPath, "utf8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }

  return envLocalPath;
}

export function parseDotEnv(contents: string): Record<string, string> {
  const parsed: Record<string, string> = {};

  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const withoutExport = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trim() : trimmed;
    const separatorIndex = withoutExport.indexOf("=");
    if (separatorIndex <= 0) {
      continue;
    }

    const key = withoutExport.slice(0, separatorIndex).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      continue;
    }
    parsed[key] = decodeDotEnvValue(withoutExport.slice(separatorIndex + 1).trim());
  }

  return parsed;
}

function decodeDotEnvValue(rawValue: string): string {
  if (
    rawValue.length >= 2 &&
    ((rawValue.startsWith('"') && rawValue.endsWith('"')) || (rawValue.startsWith("'") && rawValue.endsWith("'")))
  ) {
    const inner = rawValue.slice(1, -1);
    return rawValue[0] === "'" ? inner : inner.replace(/\\"/g, '"').replace(/\\\\/g, "\\");
  }

  return rawValue.replace(/\s+#.*$/, "").trim();
}
