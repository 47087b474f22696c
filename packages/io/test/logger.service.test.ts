import { describe, expect, it, vi } from "vitest";
import { LoggerService } from "../src/logger.service";

describe("LoggerService", () => {
  it("notifies listeners when logs are written", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    const logger = service.getLogger("router");
    logger.info({ model: "m-1" }, "dispatching");

    expect(listener).toHaveBeenCalledWith({
      level: "info",
      args: [{ model: "m-1" }, "dispatching"],
    });

    unregister();
    logger.info("after unregister");
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("notifies listeners for loggers created with withBindings", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    service.registerListener(listener);

    const logger = service.withBindings({ agent: "summariser" });
    logger.child({ attempt: 2 }).warn("retrying");

    expect(listener).toHaveBeenCalledWith({
      level: "warn",
      args: ["retrying"],
    });
  });

  it("reuses the root logger while the configuration is unchanged", () => {
    const service = new LoggerService();

    const first = service.configure({ level: "silent" });
    const second = service.configure({ level: "silent" });
    const third = service.configure({ level: "error", enableTimestamps: false });

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(third.level).toBe("error");
  });

  it("binds the scope on child loggers", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });

    expect(service.getLogger("engine").bindings()).toEqual({ scope: "engine" });
  });
});
