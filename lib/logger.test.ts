import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON object per line with the scope and fields", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    createLogger("dispatcher").warn("model candidate failed, failing over", { model: "org/model-a", status: 503 });

    expect(warn).toHaveBeenCalledTimes(1);
    const record: unknown = JSON.parse(String(warn.mock.calls[0][0]));
    expect(record).toMatchObject({
      level: "WARN",
      scope: "dispatcher",
      msg: "model candidate failed, failing over",
      model: "org/model-a",
      status: 503
    });
    expect(record).toHaveProperty("ts");
  });

  it("drops records below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("dispatcher", "error");

    logger.debug("attempting model candidate");
    logger.info("generation succeeded");
    logger.error("all model candidates failed");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    createLogger("dispatcher", "silent").error("all model candidates failed");

    expect(error).not.toHaveBeenCalled();
  });
});
