import { describe, it, expect, vi } from "vitest";
import { createLogger } from "../../src/logger";

describe("Logger", () => {
  it("prints timestamped, prefixed lines at or above its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = createLogger("generator", "info");

    log.debug("hidden");
    log.info("shown", 3);

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    const [prefix, ...rest] = info.mock.calls[0];
    expect(prefix).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\]\[generator\]$/);
    expect(rest).toEqual(["shown", 3]);
  });

  it("stays quiet when silent and nests child prefixes", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("x", "silent").error("nope");
    expect(error).not.toHaveBeenCalled();

    createLogger("api", "error").child("generate").error("boom");
    expect(error.mock.calls[0][0]).toMatch(/\[api:generate\]$/);
  });
});
