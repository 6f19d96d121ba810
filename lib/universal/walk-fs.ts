import { readdir, stat } from "node:fs/promises";
import { isAbsolute, join, relative, resolve, sep } from "node:path";

/**
 * Describes a filesystem entry encountered during a walk.
 *
 * All paths are normalized for convenience:
 * - `root` is the absolute directory that the walk is currently traversing.
 * - `path` is the absolute path to the file that matched all filters.
 * - `relPath` is `path` expressed relative to `root`, always with `/` separators.
 */
export type Encountered = {
    /** Absolute filesystem path of the current root being walked. */
    root: WalkRoot & { absRoot: string };
    /** Absolute path of the matched file. (Directories are not emitted.) */
    path: string;
    /** Path of the matched file relative to `root`. */
    relPath: string;
    /** Base name of the matched file. */
    name: string;
};

/** Per-root configuration. */
export type WalkRoot = {
    /** Root directory to walk. Can be absolute or relative (resolved against `baseDir`). */
    root: string;
    /** Base directory used to resolve a relative `root`. */
    baseDir: string;
    /** Optional file name suffixes (e.g. `.dl`). If omitted/empty, all files are included. */
    include?: string[];
    /** Optional `relPath` prefixes (e.g. `drafts/`). Files under any of them are skipped. */
    exclude?: string[];
};

async function* walkFiles(dir: string): AsyncGenerator<string> {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
    for (const entry of entries) {
        const abs = join(dir, entry.name);
        // symlinks are neither files nor directories here, so they are never followed
        if (entry.isDirectory()) yield* walkFiles(abs);
        else if (entry.isFile()) yield abs;
    }
}

/**
 * Walk one or more root directories and invoke an `ingest` callback for each file
 * that passes the optional include/exclude filters.
 *
 * ## Roots
 * - Relative roots are resolved against that entry's `baseDir`, not the CWD.
 * - Roots that don't exist or aren't directories go to `onInvalidRoot` and are skipped.
 *
 * ## Ordering & de-duplication
 * - Directory entries are visited in sorted order, so runs are reproducible.
 * - If roots overlap, the same absolute file path is processed only once.
 *
 * @returns the absolute paths of every ingested file.
 *
 * @example
 * ```ts
 * await walkRoots(
 *   {
 *     ctx: { collected: [] as string[] },
 *     roots: [{ root: "rules", baseDir: process.cwd(), include: [".dl"] }],
 *   },
 *   (ctx, { relPath }) => {
 *     ctx.collected.push(relPath);
 *   },
 * );
 * ```
 */
export async function walkRoots<Context>(
    init: {
        ctx: Context;
        roots: WalkRoot[];
        onInvalidRoot?: (root: string) => void | Promise<void>;
    },
    ingest: (
        ctx: Context,
        encountered: Readonly<Encountered>,
    ) => void | Promise<void>,
): Promise<Set<string>> {
    const seen = new Set<string>();
    for (const spec of init.roots) {
        const absRoot = isAbsolute(spec.root)
            ? spec.root
            : resolve(spec.baseDir, spec.root);

        const isDir = await stat(absRoot).then(
            (st) => st.isDirectory(),
            () => false,
        );
        if (!isDir) {
            await init.onInvalidRoot?.(absRoot);
            continue;
        }

        const include = spec.include ?? [];
        const exclude = spec.exclude ?? [];

        for await (const abs of walkFiles(absRoot)) {
            if (seen.has(abs)) continue;

            const relPath = relative(absRoot, abs).split(sep).join("/");
            const name = relPath.slice(relPath.lastIndexOf("/") + 1);
            if (include.length && !include.some((ext) => name.endsWith(ext))) {
                continue;
            }
            if (exclude.some((prefix) => relPath.startsWith(prefix))) continue;

            seen.add(abs);
            await ingest(init.ctx, {
                root: { ...spec, absRoot },
                path: abs,
                relPath,
                name,
            });
        }
    }
    return seen;
}
