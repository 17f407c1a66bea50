/**
 * Interactive prompt utilities
 *
 * Uses the "prompts" package for user interaction
 */
import prompts, { type PromptObject } from "prompts";

/**
 * Prompt cancellation error
 */
export class PromptCancelledError extends Error {
  constructor() {
    super("Prompt cancelled by user");
    this.name = "PromptCancelledError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function onCancel(): void {
  throw new PromptCancelledError();
}

function isCancelled(response: Record<string, unknown>): boolean {
  return Object.keys(response).length === 0;
}

/**
 * Input prompt - text input
 *
 * @throws PromptCancelledError if user cancels
 */
export async function input(message: string): Promise<string> {
  const promptObj: PromptObject = {
    type: "text",
    name: "value",
    message,
    validate: (value: string) => value.trim().length > 0 || "A value is required",
  };

  const response = await prompts(promptObj, { onCancel });

  if (isCancelled(response)) {
    throw new PromptCancelledError();
  }

  const value: unknown = response["value"];
  return typeof value === "string" ? value : "";
}

