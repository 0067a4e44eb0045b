import { describe, expect, it } from "vitest";
import { InvalidModeError } from "../src/errors.js";
import { isProxyMode, ModeController } from "../src/modeController.js";

describe("ModeController", () => {
  it("starts in playback by default", () => {
    expect(new ModeController().getMode()).toBe("playback");
  });

  it("starts in the configured mode", () => {
    expect(new ModeController("record").getMode()).toBe("record");
  });

  it("rejects an invalid initial mode", () => {
    expect(() => new ModeController("replay")).toThrow(InvalidModeError);
  });

  it("switches between record and playback", () => {
    const controller = new ModeController("playback");

    expect(controller.setMode("record")).toBe("record");
    expect(controller.getMode()).toBe("record");
    expect(controller.setMode("playback")).toBe("playback");
    expect(controller.getMode()).toBe("playback");
  });

  it("treats setting the current mode as a no-op", () => {
    const controller = new ModeController("record");

    controller.setMode("record");

    expect(controller.getMode()).toBe("record");
  });

  it("keeps the current mode when given an invalid value", () => {
    const controller = new ModeController("record");

    expect(() => controller.setMode("Playback")).toThrow(
      "invalid mode: Playback (must be 'record' or 'playback')"
    );
    expect(controller.getMode()).toBe("record");
  });

  it("recognises exactly two modes", () => {
    expect(isProxyMode("record")).toBe(true);
    expect(isProxyMode("playback")).toBe(true);
    expect(isProxyMode("")).toBe(false);
    expect(isProxyMode(undefined)).toBe(false);
  });
});
