import os from "node:os";
import path from "node:path";

function resolveLexhandleRoot(): string {
    const root = process.env.LEXHANDLE_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.join(os.homedir(), ".lexhandle");
}

export const DEFAULT_LEXHANDLE_DIR = resolveLexhandleRoot();

export function resolveLexhandlePath(...segments: string[]): string {
    return path.join(DEFAULT_LEXHANDLE_DIR, ...segments);
}
