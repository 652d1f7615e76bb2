import Enquirer from "enquirer";

export type PromptChoice<TValue extends string> = {
    value: TValue;
    name: string;
    description?: string;
};

export type PromptInputConfig = {
    message: string;
    default?: string;
};

export type PromptConfirmConfig = {
    message: string;
    default?: boolean;
};

export type PromptSelectConfig<TValue extends string> = {
    message: string;
    choices: Array<PromptChoice<TValue>>;
};

export type PromptMultiSelectConfig<TValue extends string> = PromptSelectConfig<TValue> & {
    selected?: readonly TValue[];
};

type PromptOptions = Parameters<typeof Enquirer.prompt>[0];

type PromptResult<TValue> = {
    value?: TValue;
};

const CANCEL_ERROR_NAMES = new Set(["CancelError", "ExitPromptError", "AbortError"]);

function isPromptCancelled(error: unknown): boolean {
    // enquirer rejects with an empty string when user cancels
    if (typeof error === "string") {
        return true;
    }
    return error instanceof Error && CANCEL_ERROR_NAMES.has(error.name);
}

async function runPrompt<TValue>(options: PromptOptions): Promise<TValue | null> {
    try {
        const result = await Enquirer.prompt<PromptResult<TValue>>(options);
        return result.value ?? null;
    } catch (error) {
        if (isPromptCancelled(error)) {
            return null;
        }
        throw error;
    }
}

export async function promptInput(config: PromptInputConfig): Promise<string | null> {
    return runPrompt<string>({
        type: "input",
        name: "value",
        message: config.message,
        initial: config.default
    });
}

export async function promptConfirm(config: PromptConfirmConfig): Promise<boolean | null> {
    return runPrompt<boolean>({
        type: "confirm",
        name: "value",
        message: config.message,
        initial: config.default
    });
}

export async function promptSelect<TValue extends string>(config: PromptSelectConfig<TValue>): Promise<TValue | null> {
    const value = await runPrompt<string>({
        type: "select",
        name: "value",
        message: config.message,
        choices: config.choices.map((choice) => ({
            name: choice.value,
            message: choice.name,
            hint: choice.description
        }))
    });
    return config.choices.find((choice) => choice.value === value)?.value ?? null;
}

/**
 * Multi-choice prompt; returns the chosen values in choice order, or null when cancelled.
 */
export async function promptMultiSelect<TValue extends string>(
    config: PromptMultiSelectConfig<TValue>
): Promise<TValue[] | null> {
    const selected = new Set<string>(config.selected ?? []);
    const values = await runPrompt<string[]>({
        type: "multiselect",
        name: "value",
        message: config.message,
        choices: config.choices.map((choice) => ({
            name: choice.value,
            message: choice.name,
            hint: choice.description,
            enabled: selected.has(choice.value)
        }))
    });
    if (values === null) {
        return null;
    }
    return config.choices.filter((choice) => values.includes(choice.value)).map((choice) => choice.value);
}
