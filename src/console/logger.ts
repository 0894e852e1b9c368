import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import type { Console } from "./console.js";

const DEFAULT_LOG_DIR = path.join(os.homedir(), ".folder-destination", "logs");
const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;
const LOG_FILE_BASENAME = "folder-destination";

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Also print each message to stdout (info/progress) or stderr (warn/error) */
    echo?: boolean;
}

type Level = "PROGRESS" | "INFO" | "WARN" | "ERROR";

/**
 * Console implementation that appends to a rotating log file.
 */
export class Logger implements Console {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;
    private echo: boolean;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? DEFAULT_LOG_DIR;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.echo = options.echo ?? false;
        this.logFile = path.join(this.logDir, `${LOG_FILE_BASENAME}.log`);
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    progress(message: string): void {
        this.write("PROGRESS", message);
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: Level, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line, "utf-8");

        if (this.echo) {
            if (level === "WARN" || level === "ERROR") {
                process.stderr.write(`${message}\n`);
            } else {
                process.stdout.write(`${message}\n`);
            }
        }
    }

    private rotateIfNeeded(): void {
        if (!fs.existsSync(this.logFile)) return;

        const stat = fs.statSync(this.logFile);
        if (stat.size < this.maxLogSize) return;

        // Shift existing numbered logs, dropping the oldest
        for (let i = this.maxLogFiles - 1; i > 0; i--) {
            const from = path.join(this.logDir, `${LOG_FILE_BASENAME}.${i}.log`);
            const to = path.join(this.logDir, `${LOG_FILE_BASENAME}.${i + 1}.log`);
            if (fs.existsSync(from)) {
                if (i + 1 >= this.maxLogFiles) {
                    fs.unlinkSync(from);
                } else {
                    fs.renameSync(from, to);
                }
            }
        }

        fs.renameSync(this.logFile, path.join(this.logDir, `${LOG_FILE_BASENAME}.1.log`));
    }
}
