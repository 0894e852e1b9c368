import * as fs from "node:fs";
import * as path from "node:path";
import type { Console } from "../console/console.js";
import { DestinationConflict, errnoOf, IOFailure, UnsupportedOperation } from "../errors.js";
import { createPathMatcher } from "./path-matcher.js";
import { stagedWrite } from "./staging.js";
import { copyRecursively, deleteRecursively, io } from "./tree-ops.js";

const FOLDER_DESTINATION_NAME = "!FolderDestination";

export type WriterState = "Idle" | "EnsuringDirectory" | "Cleaning" | "Copying" | "Done" | "Failed";

export type WriteOutcome = "OK";

/**
 * What the upstream pipeline hands over for one write.
 */
export interface TransformResult {
    /** Finished output tree; read, never modified */
    outputTree: string;
    /** Glob patterns, relative to the destination, naming paths to preserve */
    excludedPaths: readonly string[];
}

export interface WriterOptions {
    /** Build the new tree beside the destination and swap it in with a rename */
    atomic?: boolean;
}

/**
 * The first existing path on the way down to `target` that is not a directory.
 */
function findNonDirectory(target: string): string | null {
    const { root } = path.parse(target);
    const segments = path.relative(root, target).split(path.sep).filter((s) => s !== "");

    let current = root;
    for (const segment of segments) {
        current = path.join(current, segment);
        const stat = io("read", current, () => fs.statSync(current, { throwIfNoEntry: false }));
        if (stat === undefined) return null;
        if (!stat.isDirectory()) return current;
    }
    return null;
}

/**
 * Create the destination root and its ancestors. A file in the way is a
 * DestinationConflict rather than a plain I/O failure.
 */
export function ensureDestinationDirectory(localFolder: string): void {
    try {
        fs.mkdirSync(localFolder, { recursive: true });
    } catch (err) {
        const code = errnoOf(err);
        if (code === "EEXIST" || code === "ENOTDIR") {
            const offending = findNonDirectory(localFolder);
            if (offending !== null) {
                throw new DestinationConflict(localFolder, offending);
            }
        }
        throw new IOFailure("mkdir", localFolder, err);
    }
}

/**
 * Writes one output tree into the destination folder: everything not excluded is
 * deleted, then the tree is copied in. An in-place write that fails part way leaves
 * the folder as it was at that point.
 */
export class FolderWriter {
    private currentState: WriterState = "Idle";

    constructor(
        private readonly localFolder: string,
        private readonly options: WriterOptions = {},
    ) {}

    get state(): WriterState {
        return this.currentState;
    }

    write(result: TransformResult, console: Console): WriteOutcome {
        try {
            this.transition("EnsuringDirectory");
            console.progress(`FolderDestination: creating ${this.localFolder}`);
            ensureDestinationDirectory(this.localFolder);

            const preserve = createPathMatcher(this.localFolder, result.excludedPaths);

            if (this.options.atomic) {
                this.transition("Copying");
                console.progress(`FolderDestination: staging contents of the workdir for ${this.localFolder}`);
                const outcome = stagedWrite(this.localFolder, result.outputTree, preserve);
                if (outcome === "swapped") {
                    this.transition("Done");
                    return "OK";
                }
                console.warn(
                    `FolderDestination: cannot swap a staged copy into ${this.localFolder}; writing in place`,
                );
            }

            this.transition("Cleaning");
            console.progress(`FolderDestination: deleting previous data from ${this.localFolder}`);
            deleteRecursively(this.localFolder, preserve);

            this.transition("Copying");
            console.progress(`FolderDestination: Copying contents of the workdir to ${this.localFolder}`);
            copyRecursively(result.outputTree, this.localFolder);

            this.transition("Done");
            return "OK";
        } catch (err) {
            this.transition("Failed");
            throw err;
        }
    }

    private transition(next: WriterState): void {
        this.currentState = next;
    }
}

/**
 * A destination that puts the output in a local folder.
 */
export class FolderDestination {
    constructor(
        readonly localFolder: string,
        private readonly writerOptions: WriterOptions = {},
    ) {}

    newWriter(): FolderWriter {
        return new FolderWriter(this.localFolder, this.writerOptions);
    }

    /** Folders keep no history, so there is never a previous ref. */
    getPreviousRef(_labelName: string): string | null {
        return null;
    }

    getLabelNameWhenOrigin(): string {
        throw new UnsupportedOperation(`${FOLDER_DESTINATION_NAME} does not support labels`);
    }
}
