import * as fs from "node:fs";
import * as path from "node:path";
import { IOFailure, type IOOperation } from "../errors.js";
import type { PathMatcher } from "./path-matcher.js";

/**
 * Run a filesystem call, turning whatever it throws into an IOFailure for `filePath`.
 */
export function io<T>(operation: IOOperation, filePath: string, fn: () => T): T {
    try {
        return fn();
    } catch (err) {
        throw new IOFailure(operation, filePath, err);
    }
}

export function readEntries(dirPath: string): fs.Dirent[] {
    return io("read", dirPath, () => fs.readdirSync(dirPath, { withFileTypes: true }));
}

function lstatOrNull(filePath: string): fs.Stats | null {
    return io("read", filePath, () => fs.lstatSync(filePath, { throwIfNoEntry: false }) ?? null);
}

/**
 * Create `dirPath` and its missing ancestors. A symlink sitting where the
 * directory should be is replaced, never written through.
 */
export function ensureDir(dirPath: string): void {
    if (lstatOrNull(dirPath)?.isSymbolicLink()) {
        io("delete", dirPath, () => fs.unlinkSync(dirPath));
    }
    io("mkdir", dirPath, () => fs.mkdirSync(dirPath, { recursive: true }));
}

/**
 * Copy one non-directory entry, replacing whatever file or symlink is at `destPath`.
 * @returns false when the entry is neither a regular file nor a symlink
 */
export function copyLeaf(srcPath: string, destPath: string, entry: fs.Dirent): boolean {
    if (entry.isSymbolicLink()) {
        const target = io("read", srcPath, () => fs.readlinkSync(srcPath));
        if (lstatOrNull(destPath) !== null) {
            io("delete", destPath, () => fs.unlinkSync(destPath));
        }
        io("copy", destPath, () => fs.symlinkSync(target, destPath));
        return true;
    }
    if (entry.isFile()) {
        if (lstatOrNull(destPath)?.isSymbolicLink()) {
            io("delete", destPath, () => fs.unlinkSync(destPath));
        }
        io("copy", destPath, () => fs.copyFileSync(srcPath, destPath));
        return true;
    }
    return false;
}

/**
 * Delete every entry below `root` for which `keep` returns false.
 * Symlinks are removed, never followed. A directory goes only when it is not
 * kept and nothing is left inside it; `root` itself is never removed.
 * Each path is matched on its own: keeping a directory does not keep its children.
 * @returns Number of entries removed
 */
export function deleteRecursively(root: string, keep: PathMatcher): number {
    let deleted = 0;

    function visit(dirPath: string): void {
        for (const entry of readEntries(dirPath)) {
            const fullPath = path.join(dirPath, entry.name);

            if (entry.isDirectory()) {
                visit(fullPath);
                if (!keep(fullPath) && readEntries(fullPath).length === 0) {
                    io("delete", fullPath, () => fs.rmdirSync(fullPath));
                    deleted++;
                }
            } else if (!keep(fullPath)) {
                io("delete", fullPath, () => fs.unlinkSync(fullPath));
                deleted++;
            }
        }
    }

    visit(root);
    return deleted;
}

/**
 * Copy the contents of `source` into `destination`, creating directories as needed.
 * Existing files are overwritten; nothing at the destination is deleted.
 * Symlinks are recreated with the same target. Other special files are skipped.
 * @returns Number of files and symlinks written
 */
export function copyRecursively(source: string, destination: string): number {
    let copied = 0;

    function visit(srcDir: string, destDir: string): void {
        for (const entry of readEntries(srcDir)) {
            const srcPath = path.join(srcDir, entry.name);
            const destPath = path.join(destDir, entry.name);

            if (entry.isDirectory()) {
                ensureDir(destPath);
                visit(srcPath, destPath);
            } else if (copyLeaf(srcPath, destPath, entry)) {
                copied++;
            }
        }
    }

    // The destination itself may be reached through a symlink; only entries below it are checked
    io("mkdir", destination, () => fs.mkdirSync(destination, { recursive: true }));
    visit(source, destination);
    return copied;
}
