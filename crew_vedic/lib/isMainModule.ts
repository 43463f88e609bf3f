import fs from "node:fs";
import { pathToFileURL } from "node:url";

/**
 * True when the module at `moduleUrl` is the script node was started with.
 * Symlinked bin entries are resolved first.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) return false;
  const invokedPath = (() => {
    try {
      return pathToFileURL(fs.realpathSync(scriptPath)).href;
    } catch {
      return undefined;
    }
  })();
  return invokedPath !== undefined && invokedPath === moduleUrl;
}
