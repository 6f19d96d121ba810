/**
 * @module markdown
 *
 * Output targets for generated Markdown.
 *
 * Generators that stream a document section by section write into a
 * {@link MarkdownSink}; the sink decides where the text lands:
 *
 * - `BufferSink` keeps every chunk in memory and joins them on `text`.
 * - `StreamSink` writes each chunk to a Node writable, `process.stdout` by default.
 *
 * Whole documents addressed by a relative path go through a
 * {@link MarkdownRenderer}, e.g. `FileRenderer`, which writes below a root
 * directory and never outside it.
 *
 * ```ts
 * const sink = new BufferSink();
 * sink.write("# Title\n");
 * await new FileRenderer("/tmp/book").write("intro.md", sink.text);
 * ```
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";

/** Append-only target; text is written exactly as given, never read back. */
export interface MarkdownSink {
    write(text: string): void;
}

/** Render target interface. Implementations return a value R (e.g., written path or content). */
export interface MarkdownRenderer<I extends string, R = unknown> {
    write(path: I, content: string): Promise<R> | R;
}

/** Collects written chunks into memory. */
export class BufferSink implements MarkdownSink {
    private readonly chunks: string[] = [];

    write(text: string): void {
        this.chunks.push(text);
    }

    get text(): string {
        return this.chunks.join("");
    }
}

/** Forwards every chunk to a writable stream as soon as it is written. */
export class StreamSink implements MarkdownSink {
    constructor(
        readonly stream: NodeJS.WritableStream = process.stdout,
    ) {}

    write(text: string): void {
        this.stream.write(text);
    }
}

/** Writes to a filesystem root; ensures parent dirs. Returns absolute path. */
export class FileRenderer<I extends string>
    implements MarkdownRenderer<I, string> {
    constructor(readonly destRoot: string) {
        this.root = resolve(destRoot);
    }
    private readonly root: string;

    async write(path: I, content: string): Promise<string> {
        const abs = resolve(this.root, path);
        const rel = relative(this.root, abs);
        if (!rel || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
            throw new Error(`Path escapes root: ${path}`);
        }
        await mkdir(dirname(abs), { recursive: true });
        await writeFile(abs, content, "utf8");
        return abs;
    }
}
