import levenshtein from "fast-levenshtein";
import { ApplyResult, NearestLineHint } from "../types.js";
import { isBlank } from "../engine/LineAnchorNormalizer.js";

const MIN_HINT_SIMILARITY = 0.5;

export interface EnhancedMatchFailure {
    blockNumber: number;
    hint?: NearestLineHint;
    nextActionHint: string;
}

export class ErrorEnhancer {
    /**
     * Finds the document line closest to the fragment's first non-blank line,
     * so a "not found" report can point at where the model probably meant.
     */
    static nearestLine(document: string, search: string): NearestLineHint | undefined {
        const anchor = search.split("\n").find(line => !isBlank(line))?.trim();
        if (!anchor) {
            return undefined;
        }

        let best: NearestLineHint | undefined;
        const lines = document.split("\n");
        for (let i = 0; i < lines.length; i++) {
            const candidate = lines[i].trim();
            if (candidate.length === 0) continue;
            const distance = levenshtein.get(anchor, candidate);
            const similarity = 1 - distance / Math.max(anchor.length, candidate.length);
            if (!best || similarity > best.similarity) {
                best = { lineNumber: i + 1, text: candidate, similarity };
            }
        }

        if (!best || best.similarity < MIN_HINT_SIMILARITY) {
            return undefined;
        }
        return { ...best, similarity: Math.round(best.similarity * 1000) / 1000 };
    }

    static enhanceMatchFailures(result: ApplyResult): EnhancedMatchFailure[] {
        const total = result.reports.length;
        return result.reports
            .filter(report => report.status === "not-found")
            .map(report => ({
                blockNumber: report.blockNumber,
                hint: report.hint,
                nextActionHint: report.hint
                    ? `Block ${report.blockNumber} of ${total} was not found. Line ${report.hint.lineNumber} looks closest: "${report.hint.text}". Re-read the file and copy the search text exactly.`
                    : `Block ${report.blockNumber} of ${total} was not found. Re-read the file; the code may have changed since the edit was generated.`
            }));
    }
}
