import { describe, it, expect } from "vitest";
import { createLogger } from "../src/utils/log.js";

describe("createLogger", () => {
  it("drops messages below the threshold and formats the rest", () => {
    const lines: string[] = [];
    const log = createLogger("latex", "warn", (l) => lines.push(l));
    log.debug("hidden");
    log.info("hidden too");
    log.warn("passes=%d", 3);
    log.error("failed: %s", "boom");
    expect(lines).toEqual(["[latex] WARN passes=3", "[latex] ERROR failed: boom"]);
  });

  it("emits nothing when silent", () => {
    const lines: string[] = [];
    const log = createLogger("latex", "silent", (l) => lines.push(l));
    log.error("nope");
    expect(lines).toEqual([]);
  });
});
