/**
 * Lot code normalization and spelling fallbacks.
 *
 * Scanners and operators drop prefixes, add dashes or pad with zeros.
 * The exact normalized code is always tried first; fallbacks are generated
 * lazily, each one applied to the previous candidate, and the caller stops
 * pulling at its first hit.
 */

/** Comparison form: trimmed, upper-case */
export function normalizeLotCode(code: string): string {
    return code.trim().toUpperCase();
}

export function lotCodesMatch(a: string, b: string): boolean {
    return normalizeLotCode(a) === normalizeLotCode(b);
}

interface LotCodeFallback {
    name: string;
    /** Returns null when the transformation does not apply */
    generate: (code: string) => string | null;
}

export const LOT_CODE_FALLBACKS: readonly LotCodeFallback[] = [
    {
        name: 'strip-separators',
        generate: (code) => {
            const stripped = code.replace(/[\s.\-_/]/g, '');
            return stripped !== code && stripped.length > 0 ? stripped : null;
        },
    },
    {
        name: 'add-lot-prefix',
        generate: (code) => (/^\d+$/.test(code) ? `L${code}` : null),
    },
    {
        name: 'drop-leading-zeros',
        generate: (code) => {
            const match = /^L0+(\d+)$/.exec(code);
            return match ? `L${match[1]}` : null;
        },
    },
];

export const MAX_LOT_CODE_CANDIDATES = 1 + LOT_CODE_FALLBACKS.length;

/**
 * Yields the normalized code, then each applicable fallback spelling.
 * Yields nothing for a blank code. Duplicates are skipped.
 */
export function* lotCodeCandidates(
    raw: string,
    maxCandidates: number = MAX_LOT_CODE_CANDIDATES
): Generator<string, void, undefined> {
    const exact = normalizeLotCode(raw);
    if (!exact || maxCandidates < 1) return;

    const seen = new Set<string>([exact]);
    yield exact;

    let base = exact;
    for (const fallback of LOT_CODE_FALLBACKS) {
        if (seen.size >= maxCandidates) return;
        const next = fallback.generate(base);
        if (next === null || seen.has(next)) continue;
        seen.add(next);
        base = next;
        yield next;
    }
}
