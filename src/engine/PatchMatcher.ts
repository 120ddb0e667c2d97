import { MATCH_TIERS, MatchSpan, MatchTier } from "../types.js";
import { isBlank, trimTrailingWhitespace } from "./LineAnchorNormalizer.js";

interface LineTable {
    lines: string[];
    starts: number[];
}

function indexLines(text: string): LineTable {
    const lines = text.split("\n");
    const starts: number[] = [];
    let offset = 0;
    for (const line of lines) {
        starts.push(offset);
        offset += line.length + 1;
    }
    return { lines, starts };
}

function lineIndexAt(table: LineTable, offset: number): number {
    let low = 0;
    let high = table.starts.length - 1;
    while (low < high) {
        const mid = (low + high + 1) >> 1;
        if (table.starts[mid] <= offset) {
            low = mid;
        } else {
            high = mid - 1;
        }
    }
    return low;
}

/** End offset of a line's content, excluding a trailing `\r`. */
function lineContentEnd(table: LineTable, index: number): number {
    const line = table.lines[index];
    const length = line.endsWith("\r") ? line.length - 1 : line.length;
    return table.starts[index] + length;
}

function wholeLineSpan(tier: MatchTier, table: LineTable, startLine: number, endLine: number): MatchSpan {
    return {
        tier,
        start: table.starts[startLine],
        end: lineContentEnd(table, endLine)
    };
}

function anchorLines(search: string): string[] {
    return search.split("\n").filter(line => !isBlank(line)).map(line => line.trim());
}

function findLine(table: LineTable, target: string, from: number): number {
    for (let i = from; i < table.lines.length; i++) {
        if (table.lines[i].trim() === target) {
            return i;
        }
    }
    return -1;
}

/**
 * Locates a search fragment in a document that may have drifted from the
 * text the fragment was written against. Tiers run from strictest to loosest
 * and the first one that accepts a span wins.
 */
export class PatchMatcher {
    public locate(document: string, search: string): MatchSpan | null {
        if (isBlank(search)) {
            return null;
        }
        for (const tier of MATCH_TIERS) {
            const span = this.matchTier(tier, document, search);
            if (span) {
                return span;
            }
        }
        return null;
    }

    public matchTier(tier: MatchTier, document: string, search: string): MatchSpan | null {
        switch (tier) {
            case "exact":
                return this.matchExact(document, search);
            case "normalized":
                return this.matchNormalized(document, search);
            case "fuzzy":
                return this.matchFuzzy(document, search);
            case "line-range":
                return this.matchLineRange(document, search);
        }
    }

    public matchExact(document: string, search: string): MatchSpan | null {
        if (search.length === 0) return null;
        const index = document.indexOf(search);
        if (index < 0) return null;
        return { tier: "exact", start: index, end: index + search.length };
    }

    /**
     * Matches after trimming trailing whitespace per line on both sides, then
     * maps the hit back onto the untrimmed document. Columns before a line's
     * trimmed end are identical in both versions, so only the end of the last
     * matched line needs care: a match that runs to its trimmed end also takes
     * the spaces and tabs that were trimmed from it, but never a closing `\r`.
     */
    public matchNormalized(document: string, search: string): MatchSpan | null {
        const trimmedSearch = trimTrailingWhitespace(search);
        if (isBlank(trimmedSearch)) return null;

        const trimmedDocument = trimTrailingWhitespace(document);
        const index = trimmedDocument.indexOf(trimmedSearch);
        if (index < 0) return null;

        const trimmed = indexLines(trimmedDocument);
        const original = indexLines(document);
        if (trimmed.lines.length !== original.lines.length) return null;

        const matchEnd = index + trimmedSearch.length;
        const startLine = lineIndexAt(trimmed, index);
        const endLine = lineIndexAt(trimmed, matchEnd);
        if (startLine < 0 || startLine >= original.lines.length) return null;

        const startColumn = index - trimmed.starts[startLine];
        const endColumn = matchEnd - trimmed.starts[endLine];
        const trimmedEndLength = trimmed.lines[endLine].length;

        const start = original.starts[startLine] + startColumn;
        const end = endColumn > 0 && endColumn === trimmedEndLength
            ? lineContentEnd(original, endLine)
            : original.starts[endLine] + endColumn;

        if (end < start) return null;
        return { tier: "normalized", start, end };
    }

    /**
     * Anchors on the first and last non-blank lines of the fragment. The
     * non-blank line count of the matched region must stay within
     * `[n - 1, n + 3]` so a stray anchor far below cannot pull in an
     * unrelated region. The end anchor is looked up from the line after the
     * start anchor, never on the start line itself; a single-anchor fragment
     * takes the one-line path instead.
     */
    public matchFuzzy(document: string, search: string): MatchSpan | null {
        const anchors = anchorLines(search);
        if (anchors.length === 0) return null;

        const table = indexLines(document);

        if (anchors.length === 1) {
            const line = findLine(table, anchors[0], 0);
            return line < 0 ? null : wholeLineSpan("fuzzy", table, line, line);
        }

        const startLine = findLine(table, anchors[0], 0);
        if (startLine < 0) return null;
        const endLine = findLine(table, anchors[anchors.length - 1], startLine + 1);
        if (endLine < 0) return null;

        let significant = 0;
        for (let i = startLine; i <= endLine; i++) {
            if (!isBlank(table.lines[i])) significant++;
        }
        if (significant < anchors.length - 1 || significant > anchors.length + 3) {
            return null;
        }
        return wholeLineSpan("fuzzy", table, startLine, endLine);
    }

    public matchLineRange(document: string, search: string): MatchSpan | null {
        const anchors = anchorLines(search);
        if (anchors.length < 3) return null;

        const table = indexLines(document);
        const keys = [
            anchors[0],
            anchors[Math.floor(anchors.length / 2)],
            anchors[anchors.length - 1]
        ];

        const found: number[] = [];
        let from = 0;
        for (const key of keys) {
            const line = findLine(table, key, from);
            if (line < 0) return null;
            found.push(line);
            from = line + 1;
        }

        const startLine = found[0];
        const endLine = found[found.length - 1];
        if (endLine - startLine + 1 > anchors.length * 2) {
            return null;
        }
        return wholeLineSpan("line-range", table, startLine, endLine);
    }
}
