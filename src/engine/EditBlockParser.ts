import { EditBlock, ParsedEdits } from "../types.js";
import { InvalidInputError } from "../errors/SyncErrors.js";
import { createEditBlock } from "./PatchApplicator.js";

const XML_BLOCK = /<block>\s*<search>([\s\S]*?)<\/search>\s*<replace>([\s\S]*?)<\/replace>\s*<\/block>/g;
const XML_SUMMARY = /<summary>\s*([\s\S]*?)\s*<\/summary>/;

const SEARCH_MARKER = "<<<<<<< SEARCH";
const SEPARATOR_MARKER = "=======";
const REPLACE_MARKER = ">>>>>>> REPLACE";

/** Drops the single newline that follows an opening tag and precedes a closing one. */
function trimTagNewlines(text: string): string {
    let result = text;
    if (result.startsWith("\r\n")) result = result.slice(2);
    else if (result.startsWith("\n")) result = result.slice(1);
    if (result.endsWith("\r\n")) result = result.slice(0, -2);
    else if (result.endsWith("\n")) result = result.slice(0, -1);
    return result;
}

function unescapeMarkers(content: string): string {
    return content
        .replace(/^\\<<<<<<< SEARCH/gm, SEARCH_MARKER)
        .replace(/^\\=======/gm, SEPARATOR_MARKER)
        .replace(/^\\>>>>>>> REPLACE/gm, REPLACE_MARKER);
}

/**
 * Parses model output into ordered edit blocks. Two layouts are accepted:
 *
 * ```
 * <edits><block><search>…</search><replace>…</replace></block></edits>
 * <summary>…</summary>
 * ```
 *
 * and conflict-marker blocks (`<<<<<<< SEARCH` / `=======` / `>>>>>>> REPLACE`),
 * where a content line that starts with a marker is escaped with `\`.
 */
export function parseEditResponse(response: string): ParsedEdits {
    const xmlBlocks = parseXmlBlocks(response);
    if (xmlBlocks.length > 0 || /<edits>/.test(response)) {
        return {
            blocks: xmlBlocks,
            summary: extractSummary(response, xmlBlocks.length),
            format: xmlBlocks.length > 0 ? "xml" : "none"
        };
    }

    if (response.includes(SEARCH_MARKER)) {
        const markerBlocks = parseMarkerBlocks(response);
        return {
            blocks: markerBlocks,
            summary: extractSummary(response, markerBlocks.length),
            format: "markers"
        };
    }

    return { blocks: [], summary: extractSummary(response, 0), format: "none" };
}

function parseXmlBlocks(response: string): EditBlock[] {
    const blocks: EditBlock[] = [];
    for (const match of response.matchAll(XML_BLOCK)) {
        blocks.push(createEditBlock(trimTagNewlines(match[1]), trimTagNewlines(match[2])));
    }
    return blocks;
}

function extractSummary(response: string, blockCount: number): string {
    const summary = XML_SUMMARY.exec(response)?.[1]?.trim();
    if (summary) return summary;
    return blockCount === 0 ? "No edit blocks returned" : `${blockCount} edit block(s)`;
}

function parseMarkerBlocks(response: string): EditBlock[] {
    const lines = response.split("\n");
    const blocks: EditBlock[] = [];
    let state: "outside" | "search" | "replace" = "outside";
    let search: string[] = [];
    let replace: string[] = [];

    lines.forEach((rawLine, index) => {
        const line = rawLine.replace(/\r$/, "");
        const marker = line.trim();
        const lineNumber = index + 1;

        if (marker === SEARCH_MARKER) {
            if (state !== "outside") {
                throw new InvalidInputError(`Unexpected '${SEARCH_MARKER}' at line ${lineNumber}`, { line: lineNumber });
            }
            state = "search";
            search = [];
            replace = [];
            return;
        }
        if (marker === SEPARATOR_MARKER && state !== "outside") {
            if (state !== "search") {
                throw new InvalidInputError(`Unexpected '${SEPARATOR_MARKER}' at line ${lineNumber}`, { line: lineNumber });
            }
            state = "replace";
            return;
        }
        if (marker === REPLACE_MARKER) {
            if (state !== "replace") {
                throw new InvalidInputError(`Unexpected '${REPLACE_MARKER}' at line ${lineNumber}`, { line: lineNumber });
            }
            blocks.push(createEditBlock(unescapeMarkers(search.join("\n")), unescapeMarkers(replace.join("\n"))));
            state = "outside";
            return;
        }

        if (state === "search") search.push(line);
        else if (state === "replace") replace.push(line);
    });

    if (state !== "outside") {
        throw new InvalidInputError(`Incomplete final block: expected '${REPLACE_MARKER}'`, { blocksParsed: blocks.length });
    }
    return blocks;
}
