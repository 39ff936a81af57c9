#!/usr/bin/env node
/**
 * 用法演示：每个级别各写一条到 logs/testLog.log。
 * 可同时启动多个进程观察同一文件的并发写入。
 */

import { closeAll, getLogger } from "../logger/index.js";

function main() {
  try {
    const log = getLogger({ filePath: "logs/testLog.log", level: "debug" });
    log.debug("debug");
    log.info("okkk");
    log.warning("warning");
    log.error("error");
    log.critical("严重错误");
  } catch (err) {
    console.error("Error writing demo log:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  } finally {
    closeAll();
  }
}

main();
