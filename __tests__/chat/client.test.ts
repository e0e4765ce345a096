import { beforeEach, describe, expect, it, vi } from "vitest";

const mockCreate = vi.hoisted(() => vi.fn());
const mockConstructor = vi.hoisted(() => vi.fn());

vi.mock("@anthropic-ai/sdk", () => ({
  default: class MockAnthropic {
    messages = { create: mockCreate };
    constructor(options: unknown) {
      mockConstructor(options);
    }
  },
}));

import { ChatClient, recentMessages } from "../../src/chat/client.js";

describe("ChatClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockCreate.mockResolvedValue({
      content: [
        { type: "text", text: "  The answer " },
        { type: "tool_use", id: "t1", name: "x", input: {} },
        { type: "text", text: "is 42.  " },
      ],
    });
  });

  it("requires an api key or auth token", () => {
    expect(() => new ChatClient({})).toThrow("ChatClient requires either apiKey or authToken");
  });

  it("uses the default model unless given one", () => {
    expect(new ChatClient({ apiKey: "test-secret" }).model).toBe("claude-sonnet-4-6");
    expect(new ChatClient({ apiKey: "test-secret", model: "claude-haiku-4-5" }).model)
      .toBe("claude-haiku-4-5");
    expect(mockConstructor).toHaveBeenCalledWith({ apiKey: "test-secret", authToken: undefined });
  });

  it("sends the request and joins text blocks", async () => {
    const client = new ChatClient({ apiKey: "test-secret" });
    const controller = new AbortController();

    const text = await client.complete(
      {
        system: "Be brief",
        messages: [{ role: "user", content: "What is 25 + 17?" }],
        temperature: 0,
        maxTokens: 256,
      },
      controller.signal,
    );

    expect(text).toBe("The answer is 42.");
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: "claude-sonnet-4-6",
        max_tokens: 256,
        messages: [{ role: "user", content: "What is 25 + 17?" }],
        system: "Be brief",
        temperature: 0,
      },
      { signal: controller.signal },
    );
  });

  it("omits optional parameters and defaults max_tokens", async () => {
    const client = new ChatClient({ authToken: "test-token" });
    await client.complete({ messages: [{ role: "user", content: "hi" }] });

    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: "claude-sonnet-4-6",
        max_tokens: 4096,
        messages: [{ role: "user", content: "hi" }],
      },
      { signal: undefined },
    );
  });
});

describe("recentMessages", () => {
  const convo = [
    { role: "user" as const, content: "q1" },
    { role: "assistant" as const, content: "a1" },
    { role: "user" as const, content: "q2" },
    { role: "assistant" as const, content: "a2" },
  ];

  it("keeps the last messages starting at a user turn", () => {
    expect(recentMessages(convo, 3)).toEqual([
      { role: "user", content: "q2" },
      { role: "assistant", content: "a2" },
    ]);
    expect(recentMessages(convo, 4)).toEqual(convo);
  });

  it("returns nothing when no user turn remains", () => {
    expect(recentMessages(convo, 1)).toEqual([]);
    expect(recentMessages([], 5)).toEqual([]);
  });
});
