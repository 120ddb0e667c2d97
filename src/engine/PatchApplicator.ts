import { ApplyResult, BlockReport, EditBlock, MatchSpan, MatchStatus } from "../types.js";
import { InvalidInputError } from "../errors/SyncErrors.js";
import { ErrorEnhancer } from "../errors/ErrorEnhancer.js";
import { createLogger } from "../utils/StructuredLogger.js";
import { metrics } from "../utils/MetricsCollector.js";
import { isBlank, stripLineNumbers } from "./LineAnchorNormalizer.js";
import { MatchCache } from "./MatchCache.js";
import { PatchMatcher } from "./PatchMatcher.js";

export interface ApplyEditsOptions {
    /** Reject a block whose span intersects text an earlier block wrote. Defaults to true. */
    validateOverlap?: boolean;
    cache?: MatchCache;
    /** Attach a nearest-line hint to blocks that were not found. Defaults to true. */
    hints?: boolean;
}

/** Half-open range of the running document written by one block. */
interface WrittenRange {
    blockNumber: number;
    start: number;
    end: number;
}

export function createEditBlock(search: string, replace: string): EditBlock {
    return { search, replace, matchStatus: "pending" };
}

export function describeApplyResult(totalApplied: number, failedBlockNumbers: number[]): string {
    const total = totalApplied + failedBlockNumbers.length;
    if (failedBlockNumbers.length === 0) {
        return `All ${totalApplied} block(s) applied`;
    }
    if (totalApplied === 0) {
        return "No blocks could be applied";
    }
    const missing = failedBlockNumbers.map(n => `#${n}`).join(", ");
    return `Applied ${totalApplied} of ${total} blocks. Not found: ${missing}`;
}

/**
 * Runs edit blocks top to bottom against a single running copy of the
 * document. Later blocks see what earlier ones wrote. A block that no tier can
 * place is reported as `not-found` and leaves the document as it was. With
 * overlap validation on, a block may not land on text an earlier block wrote.
 */
export class PatchApplicator {
    private readonly logger = createLogger("PatchApplicator");

    constructor(private readonly matcher: PatchMatcher = new PatchMatcher()) {}

    public applyEdits(document: string, blocks: readonly EditBlock[], options: ApplyEditsOptions = {}): ApplyResult {
        const validateOverlap = options.validateOverlap ?? true;
        let written: WrittenRange[] = [];
        let content = document;
        const appliedBlocks: EditBlock[] = [];
        const failedBlockNumbers: number[] = [];
        const reports: BlockReport[] = [];

        blocks.forEach((block, index) => {
            const blockNumber = index + 1;
            const search = stripLineNumbers(block.search);
            const replacement = stripLineNumbers(block.replace);

            if (isBlank(search)) {
                content = appendToEnd(content, replacement);
                this.record(appliedBlocks, reports, block, blockNumber, "exact");
                this.logger.debug("Block appended to end of document", { blockNumber });
                return;
            }

            const span = this.locate(content, search, options.cache);
            if (!span) {
                const hint = (options.hints ?? true) ? ErrorEnhancer.nearestLine(content, search) : undefined;
                failedBlockNumbers.push(blockNumber);
                this.record(appliedBlocks, reports, block, blockNumber, "not-found", hint);
                this.logger.warn("Block not found", {
                    blockNumber,
                    searchPreview: search.slice(0, 120),
                    nearestLine: hint?.lineNumber
                });
                return;
            }

            if (validateOverlap) {
                assertClear(written, span, blockNumber);
            }
            content = content.slice(0, span.start) + replacement + content.slice(span.end);
            written = shiftRanges(written, span, replacement.length);
            written.push({ blockNumber, start: span.start, end: span.start + replacement.length });
            this.record(appliedBlocks, reports, block, blockNumber, span.tier);
            this.logger.debug("Block applied", { blockNumber, tier: span.tier });
        });

        const totalApplied = appliedBlocks.filter(block => block.matchStatus !== "not-found").length;
        const totalFailed = failedBlockNumbers.length;
        const statusMessage = describeApplyResult(totalApplied, failedBlockNumbers);
        this.logger.info("Edit blocks processed", { total: blocks.length, applied: totalApplied, failed: totalFailed });

        return {
            newContent: content,
            appliedBlocks,
            failedBlockNumbers,
            totalApplied,
            totalFailed,
            isFullyApplied: totalFailed === 0,
            reports,
            statusMessage
        };
    }

    private locate(document: string, search: string, cache?: MatchCache): MatchSpan | null {
        if (!cache) {
            return this.matcher.locate(document, search);
        }
        const key = cache.keyFor(document, search);
        const cached = cache.lookup(key);
        if (cached) {
            return cached.span;
        }
        const span = this.matcher.locate(document, search);
        cache.store(key, span);
        return span;
    }

    private record(
        applied: EditBlock[],
        reports: BlockReport[],
        block: EditBlock,
        blockNumber: number,
        status: MatchStatus,
        hint?: BlockReport["hint"]
    ): void {
        applied.push({ ...block, matchStatus: status });
        reports.push(hint ? { blockNumber, status, hint } : { blockNumber, status });
        metrics.inc(`patch.blocks.${status}`);
    }
}

function appendToEnd(document: string, addition: string): string {
    if (isBlank(document)) {
        return addition + "\n";
    }
    return document.trimEnd() + "\n\n" + addition + "\n";
}

function assertClear(written: readonly WrittenRange[], span: MatchSpan, blockNumber: number): void {
    const hit = written.find(range => span.start < range.end && range.start < span.end);
    if (hit) {
        throw new InvalidInputError(
            `Edit blocks #${hit.blockNumber} and #${blockNumber} overlap in the current document`,
            { blocks: [hit.blockNumber, blockNumber] }
        );
    }
}

/** Moves ranges after a replaced span by the change in length. */
function shiftRanges(written: readonly WrittenRange[], span: MatchSpan, replacementLength: number): WrittenRange[] {
    const delta = replacementLength - (span.end - span.start);
    return written.map(range => range.start >= span.end
        ? { ...range, start: range.start + delta, end: range.end + delta }
        : range);
}
