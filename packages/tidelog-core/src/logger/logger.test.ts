import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";
import { ConfigError, IOError } from "./errors.js";
import { acquireFileLock, releaseFileLock, lockPathFor } from "./file-lock.js";
import { parseLine } from "./format.js";
import { LoggerRegistry } from "./registry.js";

function captureStream() {
    const chunks: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            chunks.push(String(chunk));
            callback();
        },
    });
    return { stream, read: () => chunks.join("") };
}

function readLines(file: string): string[] {
    return fs.readFileSync(file, "utf-8").split("\n").filter(Boolean);
}

describe("Logger", () => {
    let dir: string;
    let file: string;
    let current: Date;
    let output: ReturnType<typeof captureStream>;
    let registry: LoggerRegistry;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "tidelog_test_logger_"));
        file = path.join(dir, "logs", "testLog.log");
        current = new Date("2024-03-01T16:30:05Z");
        output = captureStream();
        registry = new LoggerRegistry({ stream: output.stream, now: () => current, hostname: "test-host" });
    });

    afterEach(() => {
        registry.closeAll();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should reuse the logger for the same file", () => {
        const first = registry.getLogger({ filePath: file });
        const second = registry.getLogger({ filePath: file, level: "debug" });
        expect(second).toBe(first);

        first.info("one");
        second.info("two");

        expect(readLines(file)).toHaveLength(2);
        expect(output.read().split("\n").filter(Boolean)).toHaveLength(2);
    });

    it("should treat relative and absolute paths as one key", () => {
        const relative = path.relative(process.cwd(), file);
        const a = registry.getLogger({ filePath: relative });
        const b = registry.getLogger({ filePath: file });
        expect(b).toBe(a);
        expect(registry.size).toBe(1);
        expect(registry.has(file)).toBe(true);
    });

    it("should write the documented line format", () => {
        const log = registry.getLogger({ filePath: file, colorEnabled: false });
        log.info("hello");

        const [line] = readLines(file);
        const parsed = parseLine(line);
        expect(parsed).not.toBeNull();
        expect(parsed?.hostname).toBe("test-host");
        expect(parsed?.timestamp).toBe("2024-03-02 00:30:05");
        expect(parsed?.path).toContain("logger.test.ts");
        expect(parsed?.path.startsWith("/")).toBe(false);
        expect(parsed?.line).toBeGreaterThan(0);
        expect(parsed?.severity).toBe("INFO");
        expect(parsed?.message).toBe("hello");
        expect(line).not.toContain("\x1b[");
    });

    it("should color messages by default in both sinks", () => {
        const log = registry.getLogger({ filePath: file });
        log.error("bad");

        const [line] = readLines(file);
        expect(line.endsWith(" - ERROR: \x1b[31mbad\x1b[0m")).toBe(true);
        expect(output.read()).toBe(line + "\n");
    });

    it("should filter below the minimum level", () => {
        const log = registry.getLogger({ filePath: file, level: "warning", colorEnabled: false });
        log.debug("d");
        log.info("i");
        log.warning("w");
        log.warn("w2");
        log.error("e");
        log.critical("c");

        const severities = readLines(file).map((l) => parseLine(l)?.severity);
        expect(severities).toEqual(["WARNING", "WARNING", "ERROR", "CRITICAL"]);
        expect(log.isEnabledFor("INFO")).toBe(false);
        expect(log.isEnabledFor("ERROR")).toBe(true);
    });

    it("should map crit to CRITICAL", () => {
        const log = registry.getLogger({ filePath: file, level: "crit", colorEnabled: false });
        log.error("skipped");
        log.log("CRITICAL", "kept");

        expect(readLines(file).map((l) => parseLine(l)?.message)).toEqual(["kept"]);
    });

    it("should append extra data", () => {
        const log = registry.getLogger({ filePath: file, colorEnabled: false });
        log.info("saved", { id: 7 });
        expect(parseLine(readLines(file)[0])?.message).toBe('saved {"id":7}');
    });

    it("should rotate through the facade at midnight", () => {
        const log = registry.getLogger({ filePath: file, colorEnabled: false, backupCount: 2 });
        log.info("yesterday");
        current = new Date("2024-03-02T16:00:00Z");
        log.info("today");

        expect(readLines(`${file}.2024-03-02`).map((l) => parseLine(l)?.message)).toEqual(["yesterday"]);
        expect(readLines(file).map((l) => parseLine(l)?.message)).toEqual(["today"]);
    });

    it("should report a postponed rotation on the console only", () => {
        const log = registry.getLogger({ filePath: file, colorEnabled: false, lockTimeoutMs: 20 });
        log.info("first");

        const held = acquireFileLock(lockPathFor(file), { timeoutMs: 100, staleMs: 60_000 });
        try {
            current = new Date("2024-03-02T16:00:00Z");
            log.info("second");
        } finally {
            releaseFileLock(held);
        }

        expect(readLines(file).map((l) => parseLine(l)?.message)).toEqual(["first", "second"]);
        const consoleLines = output.read().split("\n").filter(Boolean);
        expect(consoleLines).toHaveLength(3);
        expect(consoleLines[2].startsWith(`[tidelog] Rotation of ${file} postponed`)).toBe(true);
    });

    it("should surface file failures after writing to the console", () => {
        const log = registry.getLogger({ filePath: file, colorEnabled: false });
        log.close();

        expect(() => log.info("after close")).toThrow(IOError);
        expect(parseLine(output.read())?.message).toBe("after close");
    });

    it("should reject invalid configuration", () => {
        expect(() => registry.getLogger({ filePath: file, backupCount: -1 })).toThrow(ConfigError);
        expect(() => registry.getLogger({ filePath: "  " })).toThrow(ConfigError);
        expect(registry.size).toBe(0);
    });

    it("should reject an unwritable location", () => {
        fs.writeFileSync(path.join(dir, "plain"), "not a directory");
        expect(() => registry.getLogger({ filePath: path.join(dir, "plain", "x.log") })).toThrow(ConfigError);
    });

    it("should empty the registry on closeAll", () => {
        registry.getLogger({ filePath: file });
        registry.getLogger({ filePath: path.join(dir, "other.log") });
        expect(registry.size).toBe(2);

        registry.closeAll();
        expect(registry.size).toBe(0);
        expect(registry.has(file)).toBe(false);
    });
});
