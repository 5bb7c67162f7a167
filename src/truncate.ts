// ========================================
// Docker Command Gateway - Output Truncation
// ========================================

function annotation(originalLength: number, maxLength: number): string {
    return `\n\n[OUTPUT TRUNCATED - ${originalLength} total characters, showing first ${maxLength}]`;
}

const ANNOTATION_PATTERN = /\n\n\[OUTPUT TRUNCATED - (\d+) total characters, showing first (\d+)\]$/;

function isTruncatedBy(output: string, maxLength: number): boolean {
    const match = ANNOTATION_PATTERN.exec(output);
    if (!match) return false;
    const original = Number(match[1]);
    const shown = Number(match[2]);
    return shown === maxLength && original > maxLength && match.index === maxLength;
}

/**
 * Bound captured output to maxLength characters plus a trailing annotation
 * carrying the original length. Applying it twice with the same limit
 * returns the first result unchanged.
 */
export function truncateOutput(output: string, maxLength: number): string {
    if (output.length <= maxLength) return output;
    if (isTruncatedBy(output, maxLength)) return output;
    return output.slice(0, maxLength) + annotation(output.length, maxLength);
}

/**
 * Accumulates streamed output while holding at most maxLength characters.
 * text() matches truncateOutput applied to the full stream.
 */
export class OutputCollector {
    private readonly maxLength: number;
    private head = '';
    private total = 0;

    constructor(maxLength: number) {
        this.maxLength = maxLength;
    }

    append(chunk: string): void {
        this.total += chunk.length;
        if (this.head.length < this.maxLength) {
            this.head += chunk.slice(0, this.maxLength - this.head.length);
        }
    }

    get length(): number {
        return this.total;
    }

    text(): string {
        if (this.total <= this.maxLength) return this.head;
        return this.head + annotation(this.total, this.maxLength);
    }
}
