import { afterEach, describe, expect, test, vi } from "vitest";
import { parseCommandLineArgs } from "../src/utils/command-line-parser";
import { LogLevel, getLogger } from "../src/utils/logger";

const quiet = getLogger("Test", LogLevel.NONE);
quiet.setLevel(LogLevel.NONE);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseCommandLineArgs", () => {
  test("takes the image path with defaults", () => {
    expect(parseCommandLineArgs(["photo.png"], quiet)).toEqual({
      imagePath: "photo.png",
      outputPath: undefined,
      configFilePath: undefined,
      withAudio: true,
    });
  });

  test("reads every option", () => {
    expect(
      parseCommandLineArgs(
        ["--out", "speech.mp3", "photo.webp", "-c", "narrator.json", "--no-audio"],
        quiet
      )
    ).toEqual({
      imagePath: "photo.webp",
      outputPath: "speech.mp3",
      configFilePath: "narrator.json",
      withAudio: false,
    });
  });

  test("requires an image path", () => {
    expect(parseCommandLineArgs([], quiet)).toBeNull();
    expect(parseCommandLineArgs(["--no-audio"], quiet)).toBeNull();
  });

  test("rejects a missing option value", () => {
    expect(parseCommandLineArgs(["photo.png", "--out"], quiet)).toBeNull();
    expect(parseCommandLineArgs(["photo.png", "--config", "  "], quiet)).toBeNull();
  });

  test("rejects unknown options and extra arguments", () => {
    expect(parseCommandLineArgs(["photo.png", "--frames", "3"], quiet)).toBeNull();
    expect(parseCommandLineArgs(["a.png", "b.png"], quiet)).toBeNull();
  });

  test("prints help and stops", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(parseCommandLineArgs(["photo.png", "--help"], quiet)).toBeNull();
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain("Usage: image-narrator <image> [options]");
  });
});
