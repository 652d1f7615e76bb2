import type { GenerationListener, GenerationResult } from "../generate/generationTypes.js";
import type { UsernameGenerator } from "../generate/usernameGenerator.js";
import { getLogger } from "../log.js";
import type { GenerationRequest } from "../types.js";

const logger = getLogger("command.run");

export type GenerationInterruptibleRunOptions = {
    listener?: GenerationListener;
    signals?: NodeJS.Signals[];
    target?: NodeJS.EventEmitter;
};

/**
 * Runs a generation that the given signals (SIGINT by default) cancel cooperatively.
 * Handlers are attached only while the run is active.
 * Returns: the final result; a cancelled run keeps its accepted usernames.
 */
export async function generationInterruptibleRun(
    generator: UsernameGenerator,
    request: GenerationRequest,
    options: GenerationInterruptibleRunOptions = {}
): Promise<GenerationResult> {
    const target = options.target ?? process;
    const signals = options.signals ?? ["SIGINT"];
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "event: Cancellation requested");
        controller.abort();
    };
    for (const signal of signals) {
        target.once(signal, onSignal);
    }
    try {
        return await generator.generateAsync(request, { signal: controller.signal, listener: options.listener });
    } finally {
        for (const signal of signals) {
            target.off(signal, onSignal);
        }
    }
}
