import { createRequire } from "node:module";

// Sources run from src/, the build from dist/src/.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const requireFromHere = createRequire(__filename);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let pkg: unknown;
    try {
      pkg = requireFromHere(candidate);
    } catch {
      continue;
    }
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return null;
}

// Single source of truth for the current version.
// - Bundled builds: env var.
// - Dev/npm builds: package.json.
export const VERSION = process.env.GCP_COST_MONITOR_VERSION || readVersionFromPackageJson() || "0.0.0";
