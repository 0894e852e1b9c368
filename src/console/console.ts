/**
 * Sink for the messages the folder destination reports while it works.
 * Progress lines are informational only.
 */
export interface Console {
    progress(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface ConsoleLine {
    level: "progress" | "info" | "warn" | "error";
    message: string;
}

/**
 * Keeps every message in memory, in order.
 */
export class RecordingConsole implements Console {
    readonly lines: ConsoleLine[] = [];

    progress(message: string): void {
        this.lines.push({ level: "progress", message });
    }

    info(message: string): void {
        this.lines.push({ level: "info", message });
    }

    warn(message: string): void {
        this.lines.push({ level: "warn", message });
    }

    error(message: string): void {
        this.lines.push({ level: "error", message });
    }

    messages(level?: ConsoleLine["level"]): string[] {
        return this.lines
            .filter((line) => level === undefined || line.level === level)
            .map((line) => line.message);
    }
}
