#!/usr/bin/env node

import { Command } from "commander";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { readFileSync } from "fs";
import { runAnnotate } from "./commands.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read version from package.json
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

const program = new Command();

program
  .name("annotate")
  .description("Jot down timestamped annotations and review them later")
  .version(packageJson.version)
  .argument("[text...]", "annotation text; omit it to browse and remove annotations")
  .action(async (text: string[]) => {
    process.exitCode = await runAnnotate(text);
  });

await program.parseAsync();
