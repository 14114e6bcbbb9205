import { createRequire } from "node:module";
import { isRecord } from "./shared/guards.js";

const CORE_PACKAGE_NAME = "gfx-prune";

// src/version.ts and dist/version.js both sit one level below package.json.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json", "./package.json"] as const;

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      // candidate missing or unreadable; try the next one
      continue;
    }
    if (!isRecord(parsed) || parsed.name !== CORE_PACKAGE_NAME) {
      continue;
    }
    const version = typeof parsed.version === "string" ? parsed.version.trim() : "";
    if (version) {
      return version;
    }
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
