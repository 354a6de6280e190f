import { describe, it, expect } from "vitest";
import { getOutputMode } from "./mode.js";

const text = { json: false, quiet: false };
const tty = { isTTY: true };

describe("getOutputMode", () => {
  it("returns json when JSON output was requested", () => {
    expect(getOutputMode({ json: true, quiet: true }, tty, {})).toBe("json");
  });

  it("returns tui for an interactive terminal", () => {
    expect(getOutputMode(text, tty, { TERM: "xterm-256color" })).toBe("tui");
  });

  it("returns static when output is piped", () => {
    expect(getOutputMode(text, { isTTY: false }, {})).toBe("static");
    expect(getOutputMode(text, {}, {})).toBe("static");
  });

  it("returns static in CI", () => {
    expect(getOutputMode(text, tty, { CI: "true" })).toBe("static");
  });

  it("returns static for dumb terminals", () => {
    expect(getOutputMode(text, tty, { TERM: "dumb" })).toBe("static");
  });
});
