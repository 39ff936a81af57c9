import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // 使用 forks 而非 threads：轮转锁用 Atomics.wait 同步等待，各测试文件各自一个进程
    pool: "forks",
    include: ["packages/*/src/**/*.test.ts"],
  },
});
