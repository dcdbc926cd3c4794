import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, createLogger } from "../../../src/connectors/core/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ConsoleLogger", () => {
  it("prefixes messages and appends data as JSON", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    new ConsoleLogger("notion").info("fetched", { count: 2 });
    expect(log).toHaveBeenCalledWith('[notion] fetched {"count":2}');
  });

  it("marks warnings and errors", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("notion");
    logger.warn("slow down");
    logger.error("boom");
    expect(warn).toHaveBeenCalledWith("[notion] ⚠ slow down");
    expect(error).toHaveBeenCalledWith("[notion] ✗ boom");
  });

  it("drops messages below the threshold", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("notion", "warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("is quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("notion", "silent").error("nobody hears this");
    expect(error).not.toHaveBeenCalled();
  });

  it("logs debug at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    createLogger("notion", "debug").debug("details");
    expect(debug).toHaveBeenCalledWith("[notion] details");
  });
});
