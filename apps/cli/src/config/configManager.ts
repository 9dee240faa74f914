import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { z } from "zod";
import { AppConfigSchema, type AppConfig } from "./schema";

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  Object.values(obj).forEach((val: unknown) => {
    if (val !== null && typeof val === "object" && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  });
  return obj;
}

let cached: AppConfig | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
const APP_ROOT = path.resolve(HERE, "..", "..");

export const DEFAULT_CONFIG_PATH = "config/default.yaml";

function resolveConfigPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(APP_ROOT, preferred),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Unable to locate configuration file. Tried: ${candidates.join(", ")}`
  );
}

export function parseConfig(raw: unknown, source = "<inline>"): AppConfig {
  try {
    return deepFreeze(AppConfigSchema.parse(raw ?? {}));
  } catch (err) {
    if (err instanceof z.ZodError) {
      console.error(`[config] schema validation failed: ${source}`);
      err.issues.forEach(issue => {
        console.error(`  ${issue.path.join(".")}: ${issue.message}`);
      });
      throw new Error(`Invalid configuration in ${source} - see errors above`);
    }
    throw err;
  }
}

export function loadConfig(configPath = DEFAULT_CONFIG_PATH): AppConfig {
  if (cached) return cached;

  const resolved = resolveConfigPath(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  cached = parseConfig(YAML.parse(raw), resolved);
  return cached;
}

export function resetConfigCache() {
  cached = null;
}
