#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { generateCommand } from "./commands/generate.js";
import { interactiveCommand } from "./commands/interactive.js";
import { languagesCommand } from "./commands/languages.js";
import { getLogger, initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";
import { CASE_MODES, LANGUAGE_POLICIES, SUFFIX_MODES } from "./types.js";

const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

initLogging();

program.name("lexhandle").description("Generate ASCII usernames from words in many languages").version(pkg.version);

program
    .command("generate")
    .description("Generate a batch of usernames")
    .option("--settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("-n, --count <count>", "Number of usernames")
    .option("-c, --case <mode>", `Letter case (${CASE_MODES.join(", ")})`)
    .option("-s, --suffix <mode>", `Number suffix (${SUFFIX_MODES.join(", ")})`)
    .option("-l, --languages <tags>", "Comma separated language tags")
    .option("--policy <policy>", `Language selection (${LANGUAGE_POLICIES.join(", ")})`)
    .option("--seed <seed>", "Seed for reproducible output")
    .option("--json", "Print usernames as json")
    .option("--unsorted", "Keep generation order instead of sorting")
    .action(generateCommand);

program
    .command("interactive")
    .description("Pick options with prompts and generate repeatedly")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(interactiveCommand);

program
    .command("languages")
    .description("List supported languages and word list status")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(languagesCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

try {
    await program.parseAsync(process.argv);
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger("main").error({ error }, "error: Command failed");
    console.error(`lexhandle failed: ${message}`);
    process.exitCode = 1;
}
