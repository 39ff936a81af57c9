import { describe, it, expect } from "vitest";
import { createFormatter, formatEvent, parseLine, stripAnsi } from "./format.js";
import type { LogEvent } from "./types.js";

const opts = { hostname: "host-a", cwd: () => "/work/proj" };

function makeEvent(overrides: Partial<LogEvent> = {}): LogEvent {
    return {
        severity: "INFO",
        timestamp: new Date("2024-03-01T16:30:05Z"),
        sourcePath: "/work/proj/src/app.ts",
        sourceLine: 42,
        message: "hello",
        ...overrides,
    };
}

describe("formatEvent", () => {
    it("should render the plain line", () => {
        expect(formatEvent(makeEvent(), false, opts)).toBe(
            "host-a - 2024-03-02 00:30:05 - src/app.ts[line:42] - INFO: hello",
        );
    });

    it("should color only the message and always reset", () => {
        expect(formatEvent(makeEvent(), true, opts)).toBe(
            "host-a - 2024-03-02 00:30:05 - src/app.ts[line:42] - INFO: \x1b[32mhello\x1b[0m",
        );
        expect(formatEvent(makeEvent({ severity: "CRITICAL", message: "boom" }), true, opts)).toBe(
            "host-a - 2024-03-02 00:30:05 - src/app.ts[line:42] - CRITICAL: \x1b[31m\x1b[1mboom\x1b[0m",
        );
        expect(formatEvent(makeEvent({ severity: "DEBUG" }), true, opts)).toContain("DEBUG: \x1b[35mhello\x1b[0m");
        expect(formatEvent(makeEvent({ severity: "WARNING" }), true, opts)).toContain("WARNING: \x1b[33mhello\x1b[0m");
        expect(formatEvent(makeEvent({ severity: "ERROR" }), true, opts)).toContain("ERROR: \x1b[31mhello\x1b[0m");
    });

    it("should append extra data as JSON", () => {
        const line = formatEvent(makeEvent({ message: "saved", data: { id: 7 } }), false, opts);
        expect(line).toBe('host-a - 2024-03-02 00:30:05 - src/app.ts[line:42] - INFO: saved {"id":7}');
    });

    it("should not mutate the event", () => {
        const event = Object.freeze(makeEvent());
        formatEvent(event, true, opts);
        expect(event.sourcePath).toBe("/work/proj/src/app.ts");
        expect(event.message).toBe("hello");
    });

    it("should bind options in createFormatter", () => {
        const format = createFormatter({ ...opts, colorEnabled: false, utcOffsetMinutes: 0 });
        expect(format(makeEvent())).toBe("host-a - 2024-03-01 16:30:05 - src/app.ts[line:42] - INFO: hello");
    });
});

describe("parseLine", () => {
    it("should recover every field of a plain line", () => {
        const line = formatEvent(makeEvent({ severity: "WARNING", message: "disk at 91% - check it" }), false, opts);
        expect(parseLine(line)).toEqual({
            hostname: "host-a",
            timestamp: "2024-03-02 00:30:05",
            path: "src/app.ts",
            line: 42,
            severity: "WARNING",
            message: "disk at 91% - check it",
        });
    });

    it("should keep a message that looks like a line prefix", () => {
        const message = "replayed src/old.ts[line:3] - INFO: started";
        const parsed = parseLine(formatEvent(makeEvent({ message }), false, opts));
        expect(parsed?.path).toBe("src/app.ts");
        expect(parsed?.line).toBe(42);
        expect(parsed?.message).toBe(message);
    });

    it("should strip colors", () => {
        const parsed = parseLine(formatEvent(makeEvent(), true, opts) + "\n");
        expect(parsed?.message).toBe("hello");
        expect(parsed?.severity).toBe("INFO");
    });

    it("should return null for foreign lines", () => {
        expect(parseLine("[logger] Cleaned old log")).toBeNull();
    });
});

describe("stripAnsi", () => {
    it("should remove SGR sequences", () => {
        expect(stripAnsi("\x1b[31m\x1b[1mboom\x1b[0m")).toBe("boom");
    });
});
