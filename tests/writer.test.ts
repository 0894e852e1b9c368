import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { FolderDestination, FolderWriter } from "../src/folder/writer.js";
import { RecordingConsole } from "../src/console/console.js";
import { DestinationConflict, IOFailure, UnsupportedOperation } from "../src/errors.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "folder-destination-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

function writeFile(root: string, relativePath: string, content: string): void {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
}

/** Relative path → file content ("<dir>" for directories). */
function snapshotTree(root: string): Record<string, string> {
    const result: Record<string, string> = {};
    function walk(dir: string): void {
        for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
            const fullPath = path.join(dir, entry.name);
            const relativePath = path.relative(root, fullPath).split(path.sep).join("/");
            if (entry.isDirectory()) {
                result[relativePath] = "<dir>";
                walk(fullPath);
            } else {
                result[relativePath] = fs.readFileSync(fullPath, "utf-8");
            }
        }
    }
    walk(root);
    return result;
}

describe("FolderWriter", () => {
    let workdir: string;
    let tempDir: string;
    let dest: string;
    let console: RecordingConsole;

    beforeEach(() => {
        workdir = createTempDir();
        tempDir = createTempDir();
        dest = path.join(tempDir, "dest");
        console = new RecordingConsole();
    });

    afterEach(() => {
        cleanupDir(workdir);
        cleanupDir(tempDir);
    });

    describe.each([
        { mode: "in place", atomic: false },
        { mode: "staged", atomic: true },
    ])("write ($mode)", ({ atomic }) => {
        function newWriter(): FolderWriter {
            return new FolderDestination(dest, { atomic }).newWriter();
        }

        it("should accept a second write from the same writer", () => {
            const writer = newWriter();
            writeFile(workdir, "first.txt", "1");
            writer.write({ outputTree: workdir, excludedPaths: [] }, console);
            fs.renameSync(path.join(workdir, "first.txt"), path.join(workdir, "second.txt"));

            expect(writer.write({ outputTree: workdir, excludedPaths: [] }, console)).toBe("OK");

            expect(writer.state).toBe("Done");
            expect(snapshotTree(dest)).toEqual({ "second.txt": "1" });
        });

        it("should write through a symlinked destination and keep the link", () => {
            const real = path.join(tempDir, "real");
            writeFile(real, "old.txt", "old");
            fs.symlinkSync(real, dest);
            writeFile(workdir, "new.txt", "new");

            newWriter().write({ outputTree: workdir, excludedPaths: [] }, console);

            expect(fs.lstatSync(dest).isSymbolicLink()).toBe(true);
            expect(snapshotTree(real)).toEqual({ "new.txt": "new" });
            expect(fs.readdirSync(tempDir).sort()).toEqual(["dest", "real"]);
        });

        it("should create a missing destination with its ancestors", () => {
            dest = path.join(tempDir, "a", "b", "dest");
            writeFile(workdir, "file.txt", "content");

            expect(newWriter().write({ outputTree: workdir, excludedPaths: [] }, console)).toBe("OK");

            expect(snapshotTree(dest)).toEqual({ "file.txt": "content" });
        });

        it("should leave only excluded paths and the output tree", () => {
            writeFile(dest, "keep/local.txt", "mine");
            writeFile(dest, "old.txt", "stale");
            writeFile(dest, "dir/old2.txt", "stale");
            writeFile(workdir, "new.txt", "fresh");
            writeFile(workdir, "dir/new2.txt", "fresh2");

            newWriter().write({ outputTree: workdir, excludedPaths: ["keep/**"] }, console);

            expect(snapshotTree(dest)).toEqual({
                "keep": "<dir>",
                "keep/local.txt": "mine",
                "dir": "<dir>",
                "dir/new2.txt": "fresh2",
                "new.txt": "fresh",
            });
        });

        it("should let the output tree overwrite an excluded path", () => {
            writeFile(dest, "shared.txt", "old");
            writeFile(workdir, "shared.txt", "new");

            newWriter().write({ outputTree: workdir, excludedPaths: ["shared.txt"] }, console);

            expect(snapshotTree(dest)).toEqual({ "shared.txt": "new" });
        });

        it("should give the same result when run twice", () => {
            writeFile(dest, "keep.md", "preserved");
            writeFile(dest, "junk.txt", "junk");
            writeFile(workdir, "a.txt", "a");
            writeFile(workdir, "nested/b.txt", "b");
            const result = { outputTree: workdir, excludedPaths: ["*.md"] };

            newWriter().write(result, console);
            const once = snapshotTree(dest);
            newWriter().write(result, console);

            expect(snapshotTree(dest)).toEqual(once);
            expect(once).toEqual({
                "keep.md": "preserved",
                "a.txt": "a",
                "nested": "<dir>",
                "nested/b.txt": "b",
            });
        });

        it("should raise DestinationConflict when a file occupies the destination", () => {
            writeFile(tempDir, "dest", "I am a file");
            writeFile(workdir, "a.txt", "a");
            const writer = newWriter();

            let caught: unknown;
            try {
                writer.write({ outputTree: workdir, excludedPaths: [] }, console);
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(DestinationConflict);
            expect(caught).not.toBeInstanceOf(IOFailure);
            if (caught instanceof DestinationConflict) {
                expect(caught.offendingPath).toBe(dest);
                expect(caught.message).toBe(
                    `Cannot create '${dest}' because '${dest}' already exists and is not a directory`,
                );
            }
            expect(writer.state).toBe("Failed");
            expect(fs.readFileSync(dest, "utf-8")).toBe("I am a file");
        });

        it("should name the ancestor that is in the way", () => {
            writeFile(tempDir, "blocker", "file");
            dest = path.join(tempDir, "blocker", "dest");

            expect(() => newWriter().write({ outputTree: workdir, excludedPaths: [] }, console)).toThrow(
                `because '${path.join(tempDir, "blocker")}' already exists and is not a directory`,
            );
        });
    });

    it("should report progress at each phase", () => {
        writeFile(workdir, "a.txt", "a");
        const writer = new FolderDestination(dest).newWriter();
        expect(writer.state).toBe("Idle");

        writer.write({ outputTree: workdir, excludedPaths: [] }, console);

        expect(writer.state).toBe("Done");
        expect(console.messages("progress")).toEqual([
            `FolderDestination: creating ${dest}`,
            `FolderDestination: deleting previous data from ${dest}`,
            `FolderDestination: Copying contents of the workdir to ${dest}`,
        ]);
    });

    it("should leave the destination cleaned when copying fails in place", () => {
        writeFile(dest, "old.txt", "stale");
        const writer = new FolderDestination(dest).newWriter();

        expect(() =>
            writer.write({ outputTree: path.join(workdir, "missing"), excludedPaths: [] }, console),
        ).toThrow(IOFailure);

        expect(writer.state).toBe("Failed");
        expect(snapshotTree(dest)).toEqual({});
    });

    it("should leave the destination untouched when a staged write fails", () => {
        writeFile(dest, "old.txt", "stale");
        const writer = new FolderDestination(dest, { atomic: true }).newWriter();

        expect(() =>
            writer.write({ outputTree: path.join(workdir, "missing"), excludedPaths: [] }, console),
        ).toThrow(IOFailure);

        expect(writer.state).toBe("Failed");
        expect(snapshotTree(dest)).toEqual({ "old.txt": "stale" });
        expect(fs.readdirSync(tempDir)).toEqual(["dest"]);
    });

    it("should not leave staging folders behind after a staged write", () => {
        writeFile(dest, "old.txt", "stale");
        writeFile(workdir, "a.txt", "a");

        new FolderDestination(dest, { atomic: true }).newWriter().write(
            { outputTree: workdir, excludedPaths: [] },
            console,
        );

        expect(fs.readdirSync(tempDir)).toEqual(["dest"]);
        expect(snapshotTree(dest)).toEqual({ "a.txt": "a" });
        expect(console.messages("progress")).toEqual([
            `FolderDestination: creating ${dest}`,
            `FolderDestination: staging contents of the workdir for ${dest}`,
        ]);
    });

    it("should never modify the output tree", () => {
        writeFile(workdir, "a.txt", "a");
        writeFile(dest, "b.txt", "b");

        new FolderDestination(dest).newWriter().write({ outputTree: workdir, excludedPaths: [] }, console);

        expect(snapshotTree(workdir)).toEqual({ "a.txt": "a" });
    });
});

describe("FolderDestination", () => {
    it("should have no previous ref", () => {
        expect(new FolderDestination("/tmp/x").getPreviousRef("GitOrigin-RevId")).toBeNull();
    });

    it("should not support labels", () => {
        expect(() => new FolderDestination("/tmp/x").getLabelNameWhenOrigin()).toThrow(UnsupportedOperation);
        expect(() => new FolderDestination("/tmp/x").getLabelNameWhenOrigin()).toThrow(
            "!FolderDestination does not support labels",
        );
    });
});
