import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { AppConfigSchema, type AppConfig } from "./schema.js";

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj);
  for (const val of Object.values(obj)) {
    if (val !== null && typeof val === "object" && !Object.isFrozen(val)) {
      deepFreeze(val);
    }
  }
  return obj;
}

const cache = new Map<string, Readonly<AppConfig>>();

const HERE = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");
const DEFAULT_CONFIG = "config/default.yaml";

function resolveConfigPath(preferred: string): string {
  const candidates = [
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
    path.join(REPO_ROOT, DEFAULT_CONFIG),
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

export function parseConfig(raw: string): Readonly<AppConfig> {
  return deepFreeze(AppConfigSchema.parse(parseYaml(raw)));
}

/**
 * Load and validate a config file. Results are cached per resolved file until
 * resetConfigCache(); a path that does not exist falls back to the default.
 */
export function loadConfig(configPath = DEFAULT_CONFIG): Readonly<AppConfig> {
  const resolved = resolveConfigPath(configPath);
  const hit = cache.get(resolved);
  if (hit) return hit;

  const cfg = parseConfig(fs.readFileSync(resolved, "utf-8"));
  cache.set(resolved, cfg);
  return cfg;
}

export function resetConfigCache(): void {
  cache.clear();
}
