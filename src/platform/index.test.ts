import { describe, expect, it } from "vitest";
import { createNodeMediaSelector, createTerminalNotifier, resolvePlatformCapabilities } from "./index";

describe("resolvePlatformCapabilities", () => {
  it("offers the camera only when a device is configured", () => {
    expect(resolvePlatformCapabilities({})).toEqual({
      supportsCamera: false,
      hasLocalFilePath: true,
    });
    expect(resolvePlatformCapabilities({ camera: { device: "/dev/video0" } })).toEqual({
      supportsCamera: true,
      hasLocalFilePath: true,
    });
  });

  it("lets explicit platform settings win", () => {
    expect(
      resolvePlatformCapabilities({
        camera: { device: "/dev/video0" },
        platform: { supportsCamera: false, hasLocalFilePath: false },
      }),
    ).toEqual({ supportsCamera: false, hasLocalFilePath: false });
  });
});

describe("createNodeMediaSelector", () => {
  it("exposes the resolved platform capabilities", () => {
    const selector = createNodeMediaSelector({ platform: { hasLocalFilePath: false } });
    expect(selector.platform).toEqual({ supportsCamera: false, hasLocalFilePath: false });
  });

  it("applies capability overrides", () => {
    const platform = { supportsCamera: true, hasLocalFilePath: true };
    const selector = createNodeMediaSelector({}, { overrides: { platform } });
    expect(selector.platform).toBe(platform);
  });
});

describe("createTerminalNotifier", () => {
  it("writes to the given stream", () => {
    const chunks: string[] = [];
    const notifier = createTerminalNotifier(
      { notifier: { durationMs: 100 } },
      {
        write: (chunk) => {
          chunks.push(chunk);
          return true;
        },
      },
    );
    notifier.notify("Success!");
    expect(chunks).toEqual(["Success!\n"]);
  });
});
