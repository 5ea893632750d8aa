import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TranscriptWriter, transcriptPath } from "../transcript";

const T0 = Date.parse("2026-03-01T09:05:07Z");

describe("TranscriptWriter", () => {
  const writer = new TranscriptWriter({ utc: true });

  it("formats user prompts with a timestamp header", () => {
    expect(writer.format({ role: "user", at: T0, text: "hello" })).toBe("--- 2026-03-01 09:05:07 ---\n> hello\n\n");
  });

  it("tags prompts from scheduled tasks", () => {
    expect(writer.format({ role: "user", at: T0, text: "report", taskId: "ab12cd34" })).toBe(
      "--- 2026-03-01 09:05:07 ---\n> [task:ab12cd34] report\n\n"
    );
  });

  it("formats replies and errors", () => {
    expect(writer.format({ role: "agent", at: T0, text: "hi there" })).toBe(
      "--- 2026-03-01 09:05:07 ---\nhi there\n\n"
    );
    expect(
      writer.format({ role: "agent", at: T0, error: { code: "INVOCATION_TIMEOUT", message: "too slow" } })
    ).toBe("--- 2026-03-01 09:05:07 ---\n[error INVOCATION_TIMEOUT] too slow\n\n");
  });

  describe("append", () => {
    let root: string;

    beforeEach(async () => {
      root = await mkdtemp(path.join(os.tmpdir(), "burrow-transcript-"));
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it("appends entries in order", async () => {
      await writer.append(root, { role: "user", at: T0, text: "one" }, { role: "agent", at: T0 + 1000, text: "two" });
      await writer.append(root, { role: "user", at: T0 + 2000, text: "three" });

      expect(await readFile(transcriptPath(root), "utf8")).toBe(
        "--- 2026-03-01 09:05:07 ---\n> one\n\n" +
          "--- 2026-03-01 09:05:08 ---\ntwo\n\n" +
          "--- 2026-03-01 09:05:09 ---\n> three\n\n"
      );
    });
  });
});
