export type { Console, ConsoleLine } from "./console.js";
export { RecordingConsole } from "./console.js";
export { Logger, type LoggerOptions } from "./logger.js";
