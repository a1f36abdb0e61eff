import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, NOOP_LOGGER } from "./logger";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("folds the codec name and rendered path into the line", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    createConsoleLogger().debug("decoding variant", { codec: "ViewState", path: ["panes", 2], key: "list" });
    expect(debug).toHaveBeenCalledWith("[KeyedUnion] ViewState decoding variant at panes[2]", { key: "list" });
  });

  it("renders the root path and passes remaining fields through", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createConsoleLogger("Editor").warn("rejected discriminator", { path: [], presentKeys: [] });
    expect(warn).toHaveBeenCalledWith("[Editor] rejected discriminator at <root>", { presentKeys: [] });
  });
});

describe("NOOP_LOGGER", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes nothing", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    NOOP_LOGGER.debug("ignored", { path: [] });
    NOOP_LOGGER.warn("ignored", { path: ["list"] });
    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });
});
