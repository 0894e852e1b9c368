import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { Logger } from "../src/console/logger.js";
import { RecordingConsole } from "../src/console/console.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "folder-destination-log-test-"));
}

describe("Logger", () => {
    let logDir: string;

    beforeEach(() => {
        logDir = createTempDir();
    });

    afterEach(() => {
        fs.rmSync(logDir, { recursive: true, force: true });
    });

    it("should append timestamped lines with their level", () => {
        const logger = new Logger({ logDir });
        logger.progress("creating");
        logger.warn("careful");

        const lines = fs.readFileSync(logger.getLogFilePath(), "utf-8").split("\n");
        expect(lines).toHaveLength(3);
        expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[PROGRESS\] creating$/);
        expect(lines[1]).toMatch(/\] \[WARN\] careful$/);
        expect(lines[2]).toBe("");
    });

    it("should rotate once the log exceeds its size limit", () => {
        // ~10 bytes, so every write after the first rotates
        const logger = new Logger({ logDir, maxLogSizeMB: 0.00001, maxLogFiles: 3 });
        logger.info("first");
        logger.info("second");

        expect(fs.readFileSync(path.join(logDir, "folder-destination.1.log"), "utf-8")).toMatch(/first\n$/);
        expect(fs.readFileSync(logger.getLogFilePath(), "utf-8")).toMatch(/second\n$/);
    });
});

describe("RecordingConsole", () => {
    it("should keep messages in order and filter by level", () => {
        const console = new RecordingConsole();
        console.info("a");
        console.progress("b");
        console.error("c");

        expect(console.messages()).toEqual(["a", "b", "c"]);
        expect(console.messages("progress")).toEqual(["b"]);
    });
});
