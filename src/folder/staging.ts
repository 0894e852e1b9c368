import * as fs from "node:fs";
import * as path from "node:path";
import { errnoOf, IOFailure } from "../errors.js";
import type { PathMatcher } from "./path-matcher.js";
import { copyLeaf, copyRecursively, ensureDir, io, readEntries } from "./tree-ops.js";

/** rename(2) failures that mean the swap cannot work here, rather than a broken tree */
const SWAP_UNSUPPORTED_CODES = new Set(["EXDEV", "EPERM", "EBUSY"]);

export type StagedWriteOutcome = "swapped" | "unsupported";

function removeTree(dirPath: string): void {
    io("delete", dirPath, () => fs.rmSync(dirPath, { recursive: true, force: true }));
}

function siblingPath(root: string, label: string): string {
    return path.join(path.dirname(root), `.${path.basename(root)}.${label}-${process.pid}-${Date.now()}`);
}

/**
 * Copy the entries of `root` that `keep` selects into `staging`, with the same
 * per-path rules the in-place clean uses: a directory survives when it is kept
 * itself or something below it is.
 */
export function copyPreserved(root: string, staging: string, keep: PathMatcher): number {
    let copied = 0;

    function visit(dirPath: string, stagingDir: string): boolean {
        let keptAny = false;
        for (const entry of readEntries(dirPath)) {
            const fullPath = path.join(dirPath, entry.name);
            const stagedPath = path.join(stagingDir, entry.name);

            if (entry.isDirectory()) {
                const keptBelow = visit(fullPath, stagedPath);
                if (keptBelow || keep(fullPath)) {
                    ensureDir(stagedPath);
                    keptAny = true;
                }
            } else if (keep(fullPath)) {
                ensureDir(stagingDir);
                if (copyLeaf(fullPath, stagedPath, entry)) {
                    copied++;
                }
                keptAny = true;
            }
        }
        return keptAny;
    }

    visit(root, staging);
    return copied;
}

/**
 * Build the new content of `root` beside it and swap it into place with renames.
 *
 * Until the swap `root` is untouched; a failed swap puts the previous tree back.
 * Returns "unsupported" (with `root` untouched and staging removed) when the
 * filesystem refuses the rename, so the caller can fall back to writing in place.
 * A symlinked `root` keeps its link; the directory it points to is swapped.
 */
export function stagedWrite(root: string, outputTree: string, keep: PathMatcher): StagedWriteOutcome {
    const target = io("read", root, () => fs.realpathSync(root));
    const staging = siblingPath(target, "staging");
    const previous = siblingPath(target, "previous");

    try {
        io("mkdir", staging, () => fs.mkdirSync(staging));
        copyPreserved(root, staging, keep);
        copyRecursively(outputTree, staging);
    } catch (err) {
        removeTree(staging);
        throw err;
    }

    try {
        fs.renameSync(target, previous);
    } catch (err) {
        removeTree(staging);
        if (SWAP_UNSUPPORTED_CODES.has(errnoOf(err) ?? "")) {
            return "unsupported";
        }
        throw new IOFailure("rename", target, err);
    }

    try {
        fs.renameSync(staging, target);
    } catch (err) {
        io("rename", previous, () => fs.renameSync(previous, target));
        removeTree(staging);
        if (SWAP_UNSUPPORTED_CODES.has(errnoOf(err) ?? "")) {
            return "unsupported";
        }
        throw new IOFailure("rename", staging, err);
    }

    removeTree(previous);
    return "swapped";
}
