import { configLoad } from "../config/configLoad.js";
import { generationRequestCreate } from "../generate/generationRequestCreate.js";
import { LANGUAGE_TAGS, languageNameGet } from "../languages/languageCatalog.js";
import type { CaseMode, LanguageTag, SuffixMode } from "../types.js";
import { generationInterruptibleRun } from "./generationInterruptibleRun.js";
import { generationResultReport } from "./generationResultReport.js";
import { promptConfirm, promptInput, promptMultiSelect, promptSelect } from "./prompts.js";
import { runtimeGeneratorBuild, runtimeLoad } from "./runtimeLoad.js";
import { usernameTableFormat } from "./usernameTableFormat.js";

export type InteractiveCommandOptions = {
    settings?: string;
};

/**
 * Prompts for generation options, prints a batch, and repeats until the user stops.
 */
export async function interactiveCommand(options: InteractiveCommandOptions): Promise<void> {
    const config = await configLoad(options.settings);
    const runtime = await runtimeLoad(config);
    const generator = runtimeGeneratorBuild(runtime, Math.random);
    let defaults = config.generation;

    for (;;) {
        const caseMode = await promptSelect<CaseMode>({
            message: "Letter case",
            choices: [
                { value: "lower", name: "lowercase" },
                { value: "upper", name: "UPPERCASE" },
                { value: "capitalized", name: "Capitalized" }
            ]
        });
        if (caseMode === null) {
            return;
        }

        const suffixMode = await promptSelect<SuffixMode>({
            message: "Number suffix",
            choices: [
                { value: "none", name: "None" },
                { value: "1-digit", name: "One digit", description: "0-9" },
                { value: "2-digit", name: "Two digits", description: "00-99" },
                { value: "3-digit", name: "Three digits", description: "000-999" }
            ]
        });
        if (suffixMode === null) {
            return;
        }

        const languages = await promptMultiSelect<LanguageTag>({
            message: "Languages",
            choices: LANGUAGE_TAGS.map((tag) => ({
                value: tag,
                name: languageNameGet(tag),
                description: runtime.dataset.isReady(tag) ? tag : `${tag}, no word list`
            })),
            selected: defaults.languages
        });
        if (languages === null) {
            return;
        }
        if (languages.length === 0) {
            console.log("Select at least one language.");
            continue;
        }

        const countInput = await promptInput({ message: "How many usernames?", default: String(defaults.count) });
        if (countInput === null) {
            return;
        }
        const count = Number(countInput.trim());
        if (countInput.trim().length === 0 || !Number.isSafeInteger(count) || count < 0) {
            console.log(`"${countInput}" is not a whole number.`);
            continue;
        }

        const request = generationRequestCreate({ count, caseMode, suffixMode, languages });
        const result = await generationInterruptibleRun(generator, request);
        if (result.usernames.length > 0) {
            console.log(usernameTableFormat(result.usernames));
        }
        const report = generationResultReport(result);
        if (report) {
            console.log(report);
        }

        defaults = { ...defaults, count, caseMode, suffixMode, languages };
        const again = await promptConfirm({ message: "Generate again?", default: true });
        if (!again) {
            return;
        }
    }
}
