/** Error codes for structured error handling */
export type DocgenErrorCode =
    | "usage"
    | "io"
    | "malformed_declaration"
    | "ordering_violation";

/** Structured error with code, message, and optional source location */
export class DocgenError extends Error {
    readonly code: DocgenErrorCode;
    readonly file?: string;
    readonly line?: number;

    constructor(
        code: DocgenErrorCode,
        message: string,
        init?: { file?: string; line?: number; cause?: unknown },
    ) {
        super(message, { cause: init?.cause });
        this.name = "DocgenError";
        this.code = code;
        this.file = init?.file;
        this.line = init?.line;
    }

    /** Same error with the file name attached, keeping everything else. */
    inFile(file: string): DocgenError {
        if (this.file) return this;
        return new DocgenError(this.code, this.message, {
            file,
            line: this.line,
            cause: this.cause,
        });
    }

    /**
     * `file:line: message`, omitting whatever location is unknown. The message
     * of an underlying `Error` cause is appended after a colon.
     */
    format(): string {
        const where = [this.file, this.line].filter((v) => v !== undefined);
        const message = this.cause instanceof Error
            ? `${this.message}: ${this.cause.message}`
            : this.message;
        return where.length ? `${where.join(":")}: ${message}` : message;
    }

    get exitCode(): number {
        return this.code === "usage" ? 2 : 1;
    }
}

export const isDocgenError = (e: unknown): e is DocgenError =>
    e instanceof DocgenError;
