import path from "node:path";

import { pathExists } from "./utils.js";
import { readPackageManifest } from "./version.js";

// Config wins, then package.json "name", then the repo directory name.
export async function resolveProjectName(args: {
  repoRoot: string;
  configured?: string;
}): Promise<string> {
  if (args.configured) {
    return args.configured;
  }

  const manifestPath = path.join(args.repoRoot, "package.json");
  if (await pathExists(manifestPath)) {
    const manifest = await readPackageManifest(manifestPath);
    const name = manifest.name?.trim();
    if (name) {
      return name;
    }
  }

  return path.basename(args.repoRoot);
}
