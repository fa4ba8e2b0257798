import { createRequire } from "node:module";

/** Version from the package manifest, shared by the server and the CLI. */
export function packageVersion(): string {
  const _require = createRequire(import.meta.url);
  const { version } = _require("../package.json") as { version: string };
  return version;
}
