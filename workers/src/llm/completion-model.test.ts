import { describe, it, expect, vi } from "vitest";
import { LlmCompletionModel } from "./completion-model.js";
import type { LLMClient } from "./index.js";

describe("LlmCompletionModel", () => {
  it("should request deterministic JSON within the response budget", async () => {
    const chat = vi.fn<LLMClient["chat"]>().mockResolvedValue({
      content: '{"vehicle": {}}',
      model: "test-model",
    });
    const controller = new AbortController();

    const content = await new LlmCompletionModel({ chat }).complete(
      { system: "system prompt", user: "user prompt" },
      { responseBudget: 2048, signal: controller.signal },
    );

    expect(content).toBe('{"vehicle": {}}');
    expect(chat).toHaveBeenCalledWith("system prompt", "user prompt", {
      responseFormat: { type: "json_object" },
      temperature: 0,
      maxTokens: 2048,
      cachePrefix: "extract",
      signal: controller.signal,
    });
  });
});
