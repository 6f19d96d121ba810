/**
 * convert.ts
 * Datalog source → literate Markdown, in one left-to-right pass.
 *
 *  - comment lines (`// ...`) become Markdown prose
 *  - everything else becomes an indented code block
 *  - `.type` / `.decl` lines also get a level-4 heading naming the declared
 *    identifier, placed in front of the section they belong to
 *  - blank lines end a section; `#` preprocessor lines are dropped
 *
 * Comments have to come before code inside a section. A comment that follows
 * code without a blank line in between is rejected rather than reordered.
 */

import { BufferSink, type MarkdownSink } from "../universal/markdown.ts";
import { classifyLine } from "./classify.ts";
import { type DatalogDialect, souffleDialect } from "./dialect.ts";
import { isDocgenError } from "./errors.ts";
import { SectionAccumulator } from "./section.ts";

export type ConvertOptions = {
    dialect?: DatalogDialect;
    /** Prefix of every rendered code line; a tab unless overridden */
    indent?: string;
    /** Attached to errors so diagnostics can name the input */
    file?: string;
};

export type ConvertResult = {
    /**
     * Depth of the most recent heading written in a comment (`// ## Rules`
     * gives 2), starting at 1. Declaration headings don't use it.
     */
    headingDepth: number;
    /** Number of non-empty sections written */
    sections: number;
    /** Declared identifiers, in input order */
    declarations: string[];
};

/**
 * Split text into lines that keep their `\n` terminator. `\r\n` and lone `\r`
 * are normalized to `\n` first; the last line has no terminator when the text
 * doesn't end with one.
 */
export function splitLines(text: string): string[] {
    return text.replace(/\r\n?/g, "\n").match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function datalogToMarkdown(
    source: string | Iterable<string>,
    sink: MarkdownSink,
    options: ConvertOptions = {},
): ConvertResult {
    const { dialect = souffleDialect, indent = "\t", file } = options;
    const lines = typeof source === "string" ? splitLines(source) : source;

    const section = new SectionAccumulator();
    const result: ConvertResult = {
        headingDepth: 1,
        sections: 0,
        declarations: [],
    };
    const flush = () => {
        if (section.flush(sink, indent)) result.sections++;
    };

    try {
        let lineNo = 0;
        for (const line of lines) {
            lineNo++;
            const classified = classifyLine(line, dialect, lineNo);
            switch (classified.kind) {
                case "blank":
                    flush();
                    break;
                case "directive":
                    break;
                case "comment":
                    section.addComment(classified.text, lineNo);
                    if (classified.headingMarks) {
                        result.headingDepth = classified.headingMarks;
                    }
                    break;
                case "declaration":
                    section.addHeading(classified.identifier);
                    result.declarations.push(classified.identifier);
                    section.addCode(classified.line);
                    break;
                case "code":
                    section.addCode(classified.line);
                    break;
            }
        }
        flush();
    } catch (err) {
        if (file && isDocgenError(err)) throw err.inFile(file);
        throw err;
    }

    return result;
}

/** Convert into memory and return the Markdown along with the pass result. */
export function renderDatalogMarkdown(
    source: string | Iterable<string>,
    options?: ConvertOptions,
): ConvertResult & { markdown: string } {
    const sink = new BufferSink();
    const result = datalogToMarkdown(source, sink, options);
    return { ...result, markdown: sink.text };
}
