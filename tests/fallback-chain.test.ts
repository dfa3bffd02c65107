import * as fs from "fs";
import { describe, expect, test, vi } from "vitest";
import { TimeoutError } from "../src/utils/errors";
import { firstSuccessful, withTimeout } from "../src/utils/fallback-chain";
import { withTempDir } from "../src/utils/temp-file";

describe("firstSuccessful", () => {
  test("stops at the first provider that resolves", async () => {
    const attempt = vi.fn(async (provider: string) => {
      if (provider === "a") {
        throw new Error("a is down");
      }
      return `${provider}-result`;
    });
    const onFailure = vi.fn();

    const outcome = await firstSuccessful(["a", "b", "c"], attempt, (p) => p, onFailure);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.provider).toBe("b");
      expect(outcome.value).toBe("b-result");
      expect(outcome.failures.map((f) => f.provider)).toEqual(["a"]);
    }
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(onFailure).toHaveBeenCalledTimes(1);
  });

  test("collects every failure when nothing succeeds", async () => {
    const onFailure = vi.fn();
    const outcome = await firstSuccessful(
      ["a", "b", "c"],
      async (provider: string): Promise<string> => {
        throw new Error(`${provider} failed`);
      },
      (p) => p,
      onFailure
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.failures.map((f) => f.provider)).toEqual(["a", "b", "c"]);
    expect(onFailure).toHaveBeenCalledTimes(3);
  });

  test("an empty provider list is a failure", async () => {
    const outcome = await firstSuccessful([], async () => 1, String);
    expect(outcome).toEqual({ ok: false, failures: [] });
  });
});

describe("withTimeout", () => {
  test("passes through a value that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  test("rejects with TimeoutError when the promise never settles", async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10)).rejects.toBeInstanceOf(
      TimeoutError
    );
  });

  test("keeps the original rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("boom")), 1000)).rejects.toThrow("boom");
  });

  test("runs onTimeout only when the timer fires", async () => {
    const onTimeout = vi.fn();

    await withTimeout(Promise.resolve("fast"), 1000, onTimeout);
    expect(onTimeout).not.toHaveBeenCalled();

    await expect(
      withTimeout(new Promise<never>(() => undefined), 10, onTimeout)
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });
});

describe("withTempDir", () => {
  test("removes the directory after the work resolves", async () => {
    let seen = "";
    const result = await withTempDir(async (dir) => {
      seen = dir;
      await fs.promises.writeFile(`${dir}/file.txt`, "data");
      return "done";
    });

    expect(result).toBe("done");
    expect(fs.existsSync(seen)).toBe(false);
  });

  test("removes the directory after the work throws", async () => {
    let seen = "";
    await expect(
      withTempDir(async (dir) => {
        seen = dir;
        await fs.promises.writeFile(`${dir}/file.txt`, "data");
        throw new Error("work failed");
      })
    ).rejects.toThrow("work failed");

    expect(seen).not.toBe("");
    expect(fs.existsSync(seen)).toBe(false);
  });
});
