#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { registerDownloadCommand } from "./modules/download.js";
import { errorMessage } from "./lib/errors/types.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export async function main(argv = process.argv): Promise<void> {
  const version = readVersion();
  const program = new Command()
    .name("bulkfetch")
    .description("Download a list of URLs concurrently, retrying transient failures")
    .version(version);

  registerDownloadCommand(program, { userAgent: `bulkfetch/${version}` });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(errorMessage(error));
    process.exitCode = 1;
  }
}

void main();
