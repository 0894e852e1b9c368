/**
 * Error types surfaced by the folder destination and the format validator.
 * Every failure leaving this package is one of these; nothing is retried here.
 */

export type ErrorCode =
    | "DESTINATION_CONFLICT"
    | "IO_FAILURE"
    | "FORMAT_VALIDATION"
    | "CONFIG_INVALID"
    | "UNSUPPORTED_OPERATION";

/**
 * Base class for all errors raised by this package.
 */
export class FolderDestinationError extends Error {
    readonly code: ErrorCode;

    constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "FolderDestinationError";
        this.code = code;
    }
}

/**
 * The destination path (or one of its ancestors) exists and is not a directory.
 */
export class DestinationConflict extends FolderDestinationError {
    readonly path: string;
    readonly offendingPath: string;

    constructor(destination: string, offendingPath: string) {
        super(
            `Cannot create '${destination}' because '${offendingPath}' already exists and is not a directory`,
            "DESTINATION_CONFLICT",
        );
        this.name = "DestinationConflict";
        this.path = destination;
        this.offendingPath = offendingPath;
    }
}

export type IOOperation = "mkdir" | "delete" | "copy" | "read" | "rename";

/**
 * Any other filesystem failure while creating, deleting or copying.
 */
export class IOFailure extends FolderDestinationError {
    readonly path: string;
    readonly operation: IOOperation;
    /** errno code of the underlying failure, e.g. "EACCES" */
    readonly errno?: string;

    constructor(operation: IOOperation, filePath: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to ${operation} '${filePath}': ${detail}`, "IO_FAILURE", { cause });
        this.name = "IOFailure";
        this.path = filePath;
        this.operation = operation;
        this.errno = errnoOf(cause);
    }
}

export type FormatErrorKind = "syntax" | "arity" | "type";

/**
 * A format template does not fit its arguments. Raised before anything is formatted.
 */
export class FormatValidationError extends FolderDestinationError {
    readonly template: string;
    readonly kind: FormatErrorKind;

    constructor(template: string, kind: FormatErrorKind, detail: string) {
        super(`Invalid format: ${template}: ${detail}`, "FORMAT_VALIDATION");
        this.name = "FormatValidationError";
        this.template = template;
        this.kind = kind;
    }
}

export class ConfigError extends FolderDestinationError {
    constructor(message: string) {
        super(message, "CONFIG_INVALID");
        this.name = "ConfigError";
    }
}

export class UnsupportedOperation extends FolderDestinationError {
    constructor(message: string) {
        super(message, "UNSUPPORTED_OPERATION");
        this.name = "UnsupportedOperation";
    }
}

/**
 * Extract the errno code ("ENOENT", "EEXIST", ...) from a thrown value, if any.
 */
export function errnoOf(err: unknown): string | undefined {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}
