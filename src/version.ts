import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    const pkg = require("../package.json") as { version?: string };
    return pkg.version ?? null;
  } catch {
    return null;
  }
}

// Single source of truth for the current version.
// - Bundled builds: GLACIER_TOOLKIT_VERSION env var.
// - Dev/npm builds: package.json (one level above both src/ and dist/).
export const VERSION =
  process.env.GLACIER_TOOLKIT_VERSION || readVersionFromPackageJson() || "0.0.0";
