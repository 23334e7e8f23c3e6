#!/usr/bin/env node
import { readFileSync } from "node:fs";
import process from "node:process";

import { runCli } from "./cli";

function readVersion(): string {
  const packageJson: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );

  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }

  return "0.0.0";
}

process.exitCode = await runCli(process.argv.slice(2), {
  version: readVersion(),
  env: process.env,
  signals: process,
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
});
