import { describe, it, expect, afterEach, vi } from "vitest";

import { Logger } from "@/lib/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes child messages", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = new Logger({ level: "info" });

    logger.child("[registry]").info("Registered model v1");

    expect(info).toHaveBeenCalledWith("[registry] Registered model v1");
  });

  it("nests prefixes", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = new Logger({ level: "info" });

    logger.child("[serving]").child("[http]").info("listening");

    expect(info).toHaveBeenCalledWith("[serving] [http] listening");
  });

  it("drops messages below the level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const logger = new Logger({ level: "warn" });

    logger.info("hidden");
    logger.debug("hidden");

    expect(info).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();
  });

  it("applies the root level to existing children", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const root = new Logger({ level: "info" });
    const child = root.child("[training]");

    root.configure({ level: "silent" });
    child.info("hidden");

    expect(info).not.toHaveBeenCalled();
    expect(child.level).toBe("silent");
  });
});
