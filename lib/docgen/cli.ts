import { readFile } from "node:fs/promises";
import Table from "cli-table3";
import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { z } from "zod";
import { type MarkdownSink, StreamSink } from "../universal/markdown.ts";
import { buildBook, bookOptionsSchema } from "./book.ts";
import { datalogToMarkdown } from "./convert.ts";
import { type DatalogDialect, souffleDialect } from "./dialect.ts";
import { DocgenError, isDocgenError } from "./errors.ts";

export type CliIO = {
    /** Where rendered Markdown goes */
    stdout: MarkdownSink;
    /** Diagnostics, summaries and commander's own help/error text */
    stderr: MarkdownSink;
};

export class DocgenCLI {
    constructor(
        readonly io: CliIO = {
            stdout: new StreamSink(process.stdout),
            stderr: new StreamSink(process.stderr),
        },
        readonly dialect: DatalogDialect = souffleDialect,
    ) {
    }

    async render(file?: string) {
        if (!file) {
            throw new DocgenError("usage", "missing input file argument");
        }
        const text = await readFile(file, "utf8").catch((cause) => {
            throw new DocgenError("io", `cannot read ${file}`, { cause });
        });
        return datalogToMarkdown(text, this.io.stdout, {
            dialect: this.dialect,
            file,
        });
    }

    async book(
        rulesDir: string,
        outDir: string,
        opts: { ext?: string; quiet?: boolean },
    ) {
        const parsed = bookOptionsSchema.safeParse({
            rulesDir,
            outDir,
            ext: opts.ext,
        });
        if (!parsed.success) {
            throw new DocgenError("usage", z.prettifyError(parsed.error));
        }
        const pages = await buildBook(parsed.data, this.dialect);
        if (opts.quiet) return pages;

        if (pages.length === 0) {
            const ext = parsed.data.ext ?? this.dialect.extensions[0];
            this.io.stderr.write(
                pc.yellow(`No ${ext} files under ${rulesDir}\n`),
            );
            return pages;
        }
        const table = new Table({
            head: ["Source", "Page", "Sections", "Declarations"],
        });
        for (const page of pages) {
            table.push([
                pc.cyan(page.source),
                page.output,
                String(page.sections),
                page.declarations.length
                    ? page.declarations.join(", ")
                    : pc.gray("none"),
            ]);
        }
        this.io.stderr.write(table.toString() + "\n");
        this.io.stderr.write(
            pc.green(`📄 Wrote ${pages.length} page(s) to ${pc.bold(outDir)}\n`),
        );
        return pages;
    }

    cli(init?: { name?: string; version?: string }) {
        const program = new Command()
            .name(init?.name ?? "dl2md")
            .version(init?.version ?? "0.1.0")
            .description(
                "Turn commented Datalog into literate Markdown: comments become prose, code becomes indented blocks.",
            )
            .exitOverride()
            .configureOutput({
                writeOut: (s) => this.io.stdout.write(s),
                writeErr: (s) => this.io.stderr.write(s),
            });

        program
            .command("render", { isDefault: true })
            .description(
                "Render one Datalog file to Markdown on stdout (name the command, as in `dl2md render book`, for a file called book)",
            )
            .argument("[file]", "Datalog source file")
            .action(async (file?: string) => {
                await this.render(file);
            });

        program
            .command("book")
            .description(
                "Render every rules file under a directory into <outDir>/<name>.md",
            )
            .argument("<rulesDir>", "directory searched recursively")
            .argument("<outDir>", "directory receiving the pages")
            .option("-e, --ext <ext>", "rules file extension", ".dl")
            .option("-q, --quiet", "don't print the summary table")
            .action(
                async (
                    rulesDir: string,
                    outDir: string,
                    opts: { ext?: string; quiet?: boolean },
                ) => {
                    await this.book(rulesDir, outDir, opts);
                },
            );

        return program;
    }

    /**
     * Parse user arguments (no `node script` prefix), run the command and
     * return the process exit code. Docgen errors are reported on stderr;
     * anything else propagates.
     */
    async run(args: string[]): Promise<number> {
        try {
            await this.cli().parseAsync(args, { from: "user" });
            return 0;
        } catch (err) {
            if (err instanceof CommanderError) {
                // commander has already printed help, version or its own error
                return err.exitCode === 0 ? 0 : 2;
            }
            if (isDocgenError(err)) {
                this.io.stderr.write(pc.red(`error: ${err.format()}`) + "\n");
                return err.exitCode;
            }
            throw err;
        }
    }
}
