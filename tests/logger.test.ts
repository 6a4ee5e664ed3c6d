import { afterEach, describe, expect, it, vi } from "vitest";
import { formatConsole, logger } from "../src/logger/index.js";


describe("logger", () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = original;
    vi.restoreAllMocks();
  });

  it("格式为 [category] message {payload}", () => {
    expect(
      formatConsole({ level: "info", category: "gate", message: "输出已同步", payload: { written: 2 }, created_at: "" }),
    ).toBe('[gate] 输出已同步 {"written":2}');
    expect(formatConsole({ level: "info", category: "app", message: "done", created_at: "" })).toBe("[app] done");
  });

  it("按 LOG_LEVEL 过滤，warn/error 走对应的 console 方法", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    process.env.LOG_LEVEL = "warn";

    logger.info("app", "hidden");
    logger.warn("publisher", "推送失败", { remote: "origin" });
    logger.error("app", "boom");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[publisher] 推送失败 {"remote":"origin"}');
    expect(error).toHaveBeenCalledWith("[app] boom");
  });
});
