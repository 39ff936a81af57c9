import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { closeAll, getDefaultRegistry, getLogger } from "./registry.js";

describe("default registry", () => {
    const dir = path.join(os.tmpdir(), "tidelog_test_registry_" + Date.now());

    afterEach(() => {
        closeAll();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should be created once per process", () => {
        expect(getDefaultRegistry()).toBe(getDefaultRegistry());
    });

    it("should share loggers through getLogger", () => {
        const file = path.join(dir, "shared.log");
        const a = getLogger({ filePath: file });
        const b = getLogger({ filePath: file });

        expect(b).toBe(a);
        expect(getDefaultRegistry().has(file)).toBe(true);
        expect(fs.existsSync(file)).toBe(true);

        closeAll();
        expect(getDefaultRegistry().size).toBe(0);
    });
});
