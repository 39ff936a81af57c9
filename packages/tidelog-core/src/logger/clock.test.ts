import { describe, it, expect } from "vitest";
import { formatTimestamp, periodKey, toZonedTime } from "./clock.js";

describe("toZonedTime", () => {
    it("should shift to UTC+8 by default", () => {
        const t = toZonedTime(new Date("2024-03-01T16:30:05.123Z"));
        expect(t).toEqual({
            year: 2024,
            month: 3,
            day: 2,
            hour: 0,
            minute: 30,
            second: 5,
            millisecond: 123,
            weekday: 6,
            yearDay: 62,
            utcOffsetMinutes: 480,
        });
    });

    it("should honor other offsets", () => {
        const t = toZonedTime(new Date("2024-01-01T02:00:00Z"), -300);
        expect([t.year, t.month, t.day, t.hour]).toEqual([2023, 12, 31, 21]);
        expect(t.yearDay).toBe(365);
    });

    it("should format as YYYY-MM-DD HH:MM:SS", () => {
        expect(formatTimestamp(toZonedTime(new Date("2024-03-01T16:30:05Z")))).toBe("2024-03-02 00:30:05");
        expect(formatTimestamp(toZonedTime(new Date("2024-03-01T01:02:03Z"), 0))).toBe("2024-03-01 01:02:03");
    });
});

describe("periodKey", () => {
    it("should switch at midnight in the target offset", () => {
        expect(periodKey(new Date("2024-03-01T15:59:59Z"))).toBe("2024-03-01");
        expect(periodKey(new Date("2024-03-01T16:00:00Z"))).toBe("2024-03-02");
        expect(periodKey(new Date("2024-03-01T16:00:00Z"), 0)).toBe("2024-03-01");
    });
});
