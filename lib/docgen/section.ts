import type { MarkdownSink } from "../universal/markdown.ts";
import { isBlankLine } from "./classify.ts";
import { DocgenError } from "./errors.ts";

/**
 * Heading level of the synthesized declaration headings. Heading markers found
 * in comments are tracked by the converter but never change this.
 */
export const DECLARATION_HEADING_LEVEL = 4;

export function declarationHeading(identifier: string): string[] {
    return [`${"#".repeat(DECLARATION_HEADING_LEVEL)} \`${identifier}\`\n`, "\n"];
}

export type SectionPhase = "prose" | "code";

/**
 * Buffers one section: prose first, then code. Moving back from code to prose
 * is only possible through {@link flush}.
 */
export class SectionAccumulator {
    #phase: SectionPhase = "prose";
    #comments: string[] = [];
    #code: string[] = [];

    get phase(): SectionPhase {
        return this.#phase;
    }

    get isEmpty(): boolean {
        return this.#comments.length === 0 && this.#code.length === 0;
    }

    addComment(text: string, lineNo?: number): void {
        if (this.#phase === "code") {
            throw new DocgenError(
                "ordering_violation",
                "comment follows code in the same section; separate them with a blank line",
                { line: lineNo },
            );
        }
        this.#comments.push(text);
    }

    /** Put a declaration heading in front of everything buffered as prose. */
    addHeading(identifier: string): void {
        this.#comments = [...declarationHeading(identifier), ...this.#comments];
    }

    addCode(line: string): void {
        this.#code.push(line);
        this.#phase = "code";
    }

    /**
     * Write the buffered section and reset to an empty prose phase. Returns
     * `false` (and writes nothing) when there was nothing buffered.
     */
    flush(sink: MarkdownSink, indent = "\t"): boolean {
        if (this.isEmpty) return false;
        writeSection(sink, this.#comments, this.#code, indent);
        this.#comments = [];
        this.#code = [];
        this.#phase = "prose";
        return true;
    }
}

export function writeSection(
    sink: MarkdownSink,
    comments: readonly string[],
    code: readonly string[],
    indent = "\t",
): void {
    for (const line of comments) sink.write(line);
    const lastComment = comments.at(-1);
    if (lastComment !== undefined && !isBlankLine(lastComment)) sink.write("\n");

    for (const line of code) sink.write(indent + line);
    const lastCode = code.at(-1);
    if (lastCode !== undefined && !isBlankLine(lastCode)) sink.write("\n");
}
