import { type DatalogDialect, isDeclarationKeyword } from "./dialect.ts";
import { DocgenError } from "./errors.ts";

/**
 * What a single raw input line means to the section emitter. Raw lines keep
 * their terminator; `code` and `declaration` carry the line verbatim.
 */
export type ClassifiedLine =
    | { kind: "blank" }
    | { kind: "directive" }
    | {
        kind: "comment";
        /** Comment markers and one leading space removed, terminator kept */
        text: string;
        /** Length of the leading `#` run of `text` (0 when it isn't a heading) */
        headingMarks: number;
    }
    | { kind: "declaration"; keyword: string; identifier: string; line: string }
    | { kind: "code"; line: string };

export const isBlankLine = (line: string) => /^\s+$/.test(line);

export function stripLineComment(line: string, marker: string): string {
    // every char of the marker is stripped from both ends, the way a
    // character-set strip would; the terminator stops the trailing side
    const chars = new Set(marker);
    let start = 0;
    let end = line.length;
    while (start < end && chars.has(line[start])) start++;
    while (end > start && chars.has(line[end - 1])) end--;
    const text = line.slice(start, end);
    return text.startsWith(" ") ? text.slice(1) : text;
}

export function leadingRun(text: string, ch: string): number {
    let n = 0;
    while (n < text.length && text[n] === ch) n++;
    return n;
}

/**
 * Classify one raw line. Checks run in a fixed order: blank, directive,
 * comment, declaration, code.
 *
 * @throws DocgenError `malformed_declaration` when a declaration keyword is not
 * followed by a token that starts with an identifier.
 */
export function classifyLine(
    line: string,
    dialect: DatalogDialect,
    lineNo?: number,
): ClassifiedLine {
    if (isBlankLine(line)) return { kind: "blank" };
    if (line.startsWith(dialect.directivePrefix)) return { kind: "directive" };

    if (line.startsWith(dialect.comment.line)) {
        const text = stripLineComment(line, dialect.comment.line);
        return { kind: "comment", text, headingMarks: leadingRun(text, "#") };
    }

    const [keyword, subject]: (string | undefined)[] = line.trim().split(/\s+/);
    if (isDeclarationKeyword(dialect, keyword)) {
        if (subject === undefined) {
            throw new DocgenError(
                "malformed_declaration",
                `${keyword} without a name: ${line.trim()}`,
                { line: lineNo },
            );
        }
        const match = dialect.identifier.exec(subject);
        if (!match) {
            throw new DocgenError(
                "malformed_declaration",
                `${keyword} name must start with a letter, '_' or '?': ${line.trim()}`,
                { line: lineNo },
            );
        }
        return { kind: "declaration", keyword, identifier: match[0], line };
    }

    return { kind: "code", line };
}
