import { DiffLine, DiffSummary } from "../types.js";

/**
 * Line-by-index comparison of two texts for conflict display. Not an
 * alignment: an inserted line shows up as a run of `modified` entries down to
 * the end of the shorter text.
 */
export function buildPositionalDiff(localText: string, remoteText: string): DiffLine[] {
    const localLines = localText.split("\n");
    const remoteLines = remoteText.split("\n");
    const total = Math.max(localLines.length, remoteLines.length);
    const diff: DiffLine[] = [];

    for (let lineIndex = 0; lineIndex < total; lineIndex++) {
        const local = lineIndex < localLines.length ? localLines[lineIndex] : undefined;
        const remote = lineIndex < remoteLines.length ? remoteLines[lineIndex] : undefined;

        if (local !== undefined && remote !== undefined) {
            diff.push(local === remote
                ? { kind: "unchanged", lineIndex, text: local }
                : { kind: "modified", lineIndex, localText: local, remoteText: remote });
        } else if (local !== undefined) {
            diff.push({ kind: "added", lineIndex, text: local });
        } else if (remote !== undefined) {
            diff.push({ kind: "removed", lineIndex, text: remote });
        }
    }
    return diff;
}

export function conflictedLineNumbers(diff: readonly DiffLine[]): number[] {
    return diff.filter(line => line.kind === "modified").map(line => line.lineIndex);
}

export function summarizeDiff(diff: readonly DiffLine[]): DiffSummary {
    const summary: DiffSummary = { unchanged: 0, added: 0, removed: 0, modified: 0 };
    for (const line of diff) {
        summary[line.kind]++;
    }
    return summary;
}

export function renderPositionalDiff(diff: readonly DiffLine[]): string {
    let output = "";
    for (const line of diff) {
        switch (line.kind) {
            case "unchanged":
                output += `  ${line.text}\n`;
                break;
            case "added":
                output += `+ ${line.text}\n`;
                break;
            case "removed":
                output += `- ${line.text}\n`;
                break;
            case "modified":
                output += `~ ${line.localText}\n  > ${line.remoteText}\n`;
                break;
        }
    }
    return output;
}
