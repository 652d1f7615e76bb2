import { configLoad } from "../config/configLoad.js";
import type { GenerationListener } from "../generate/generationTypes.js";
import { randomSeeded } from "../random/randomSeeded.js";
import { type GenerateCommandOptions, generateOptionsResolve } from "./generateOptionsResolve.js";
import { generationInterruptibleRun } from "./generationInterruptibleRun.js";
import { generationResultReport } from "./generationResultReport.js";
import { runtimeGeneratorBuild, runtimeLoad } from "./runtimeLoad.js";
import { usernameTableFormat } from "./usernameTableFormat.js";

/**
 * Generates one batch of usernames and prints them. Ctrl-C cancels and prints the partial list.
 */
export async function generateCommand(options: GenerateCommandOptions): Promise<void> {
    const config = await configLoad(options.settings);
    const resolved = generateOptionsResolve(options, config.generation);
    const runtime = await runtimeLoad(config);
    const random = resolved.seed === null ? Math.random : randomSeeded(resolved.seed);
    const generator = runtimeGeneratorBuild(runtime, random, resolved.languagePolicy);

    const result = await generationInterruptibleRun(generator, resolved.request, {
        listener: progressListenerBuild()
    });

    if (resolved.json) {
        console.log(JSON.stringify(result.usernames, null, 2));
    } else if (result.usernames.length > 0) {
        console.log(usernameTableFormat(result.usernames, { sorted: resolved.sorted }));
    }

    const report = generationResultReport(result);
    if (report) {
        console.error(report);
    }
    if (result.status === "failed") {
        process.exitCode = 1;
    }
}

function progressListenerBuild(): GenerationListener {
    if (!process.stderr.isTTY) {
        return {};
    }
    return {
        onAccept: (_username, progress) => {
            process.stderr.write(`\rGenerating username ${progress.produced}/${progress.requested}...`);
        },
        onFinish: (result) => {
            if (result.usernames.length > 0) {
                process.stderr.write("\n");
            }
        }
    };
}
