/**
 * book.ts
 * Render every rules file under a directory into `<outDir>/<name>.md`.
 *
 * Output names come from the source basename only, so `rules/a/x.dl` and
 * `rules/b/x.dl` land on the same page; the last one walked wins.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { FileRenderer } from "../universal/markdown.ts";
import { walkRoots } from "../universal/walk-fs.ts";
import { renderDatalogMarkdown } from "./convert.ts";
import { type DatalogDialect, souffleDialect } from "./dialect.ts";
import { DocgenError } from "./errors.ts";

export const bookOptionsSchema = z.object({
    rulesDir: z.string().min(1, "rules directory is required"),
    outDir: z.string().min(1, "output directory is required"),
    ext: z.string().regex(
        /^\.[\w.-]+$/,
        "extension must start with a dot, e.g. .dl",
    ).optional(),
    baseDir: z.string().optional(),
});

export type BookOptions = z.infer<typeof bookOptionsSchema>;

export type BookPage = {
    /** Source path relative to the rules directory */
    source: string;
    /** Absolute path of the written page */
    output: string;
    sections: number;
    declarations: string[];
};

export function pageName(fileName: string, ext: string): string {
    const stem = fileName.endsWith(ext)
        ? fileName.slice(0, -ext.length)
        : fileName;
    return `${stem}.md`;
}

export async function buildBook(
    options: BookOptions,
    dialect: DatalogDialect = souffleDialect,
): Promise<BookPage[]> {
    const {
        rulesDir,
        outDir,
        ext = dialect.extensions[0] ?? ".dl",
        baseDir = process.cwd(),
    } = options;
    const renderer = new FileRenderer<string>(outDir);

    const pages: BookPage[] = [];
    await walkRoots(
        {
            ctx: pages,
            roots: [{ root: rulesDir, baseDir, include: [ext] }],
            onInvalidRoot: (root) => {
                throw new DocgenError(
                    "io",
                    `rules directory not found: ${root}`,
                );
            },
        },
        async (ctx, { path, relPath, name }) => {
            const text = await readFile(path, "utf8").catch((cause) => {
                throw new DocgenError("io", `cannot read ${relPath}`, {
                    file: relPath,
                    cause,
                });
            });
            const { markdown, sections, declarations } = renderDatalogMarkdown(
                text,
                { dialect, file: relPath },
            );
            const output = await renderer.write(pageName(name, ext), markdown)
                .catch((cause) => {
                    throw new DocgenError(
                        "io",
                        `cannot write page for ${relPath}`,
                        { file: relPath, cause },
                    );
                });
            ctx.push({ source: relPath, output, sections, declarations });
        },
    );
    return pages;
}
