import { createRequire } from "node:module";

/** Package version, read from package.json beside src/ or dist/. */
export function getPackageVersion(): string {
  try {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require("../package.json");
    if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
      return typeof pkg.version === "string" ? pkg.version : "0.0.0";
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}
