/**
 * Reduces a raw lexicon lemma to a single ASCII token.
 *
 * Expects: any string, including multi-word lemmas such as "ice_cream".
 * Returns: the letters and digits of the NFKD form with combining marks removed
 *          and separators dropped ("Saint-Étienne" -> "SaintEtienne"), or null
 *          when a character without an ASCII decomposition remains ("straße").
 */
export function wordAsciiReduce(raw: string): string | null {
    const joined = raw
        .normalize("NFKD")
        .replace(/\p{M}+/gu, "")
        .replace(/[^\p{L}\p{N}]+/gu, "");
    if (!/^[A-Za-z0-9]*$/.test(joined)) {
        return null;
    }
    return joined;
}
