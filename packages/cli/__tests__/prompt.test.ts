import { describe, it, expect } from "vitest";
import prompts from "prompts";
import { PromptCancelledError, input } from "../src/utils/prompt.js";

describe("input", () => {
  it("returns the answer", async () => {
    prompts.inject(["/srv/code"]);

    await expect(input("Where do you keep your source code?")).resolves.toBe("/srv/code");
  });

  it("throws PromptCancelledError when the user aborts", async () => {
    prompts.inject([new Error("aborted")]);

    await expect(input("Where do you want to generate .deb files?")).rejects.toBeInstanceOf(PromptCancelledError);
  });
});
