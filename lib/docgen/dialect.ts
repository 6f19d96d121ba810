/**
 * dialect.ts
 * Lexical conventions of the Datalog input the docgen understands.
 *
 * Only the handful of things the line classifier needs: how comments and
 * preprocessor directives start, which keywords declare something, and what a
 * declared identifier looks like. Nothing here parses Datalog.
 */

export type DatalogDialect = {
    readonly id: string;
    /** File name suffixes picked up when building a book from a directory */
    readonly extensions: readonly string[];
    readonly comment: { readonly line: string };
    readonly directivePrefix: string;
    readonly declarationKeywords: readonly string[];
    /** Anchored at the start; the longest match is the declared name */
    readonly identifier: RegExp;
};

export const souffleDialect: DatalogDialect = {
    id: "souffle",
    extensions: [".dl"],
    comment: { line: "//" },
    directivePrefix: "#",
    declarationKeywords: [".type", ".decl"],
    identifier: /^[?_a-zA-Z][_a-zA-Z]*/,
};

export function isDeclarationKeyword(
    dialect: DatalogDialect,
    token: string | undefined,
): token is string {
    return token !== undefined && dialect.declarationKeywords.includes(token);
}
