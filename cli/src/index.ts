#!/usr/bin/env node
import { Command } from "commander";

import { configureSearchCommand } from "./commands/search";

async function main() {
  const program = new Command();

  program
    .name("dirhound")
    .description("Breadth-first file search honoring the root .gitignore")
    .version("0.1.0");

  configureSearchCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
