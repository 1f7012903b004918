#!/usr/bin/env node

import { createRequire } from "node:module";
import { createProgram } from "./program.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

async function main(): Promise<void> {
  await createProgram(pkg.version).parseAsync(process.argv);
}

main().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
