import { parseChatStreamEvent } from "../../../adapters/openai/chat-stream-event.parser";

describe("parseChatStreamEvent", () => {
  it("parses a content delta", () => {
    const event = parseChatStreamEvent(
      '{"id":"c-1","object":"chat.completion.chunk","created":1700000000,"model":"gpt-4","choices":[{"index":0,"delta":{"content":"Hi"},"finish_reason":null}]}',
    );

    expect(event).toEqual({
      id: "c-1",
      object: "chat.completion.chunk",
      created: 1700000000,
      model: "gpt-4",
      choices: [{ index: 0, delta: { content: "Hi" } }],
    });
  });

  it("treats null content as absent", () => {
    const event = parseChatStreamEvent(
      '{"object":"chat.completion.chunk","created":1,"model":"m","choices":[{"index":0,"delta":{"role":"assistant","content":null}}]}',
    );

    expect(event.choices[0].delta).toEqual({ role: "assistant" });
    expect("content" in event.choices[0].delta).toBe(false);
  });

  it("keeps the finish reason and usage", () => {
    const event = parseChatStreamEvent(
      JSON.stringify({
        object: "chat.completion.chunk",
        created: 1,
        model: "m",
        choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
        usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 },
      }),
    );

    expect(event.choices[0].finish_reason).toBe("stop");
    expect(event.usage).toEqual({
      prompt_tokens: 3,
      completion_tokens: 4,
      total_tokens: 7,
    });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseChatStreamEvent("{malformed}")).toThrow(SyntaxError);
  });

  it("rejects JSON without the chunk fields", () => {
    expect(() => parseChatStreamEvent('{"choices":[]}')).toThrow(
      "'object' must be a string",
    );
    expect(() =>
      parseChatStreamEvent('{"object":"x","created":1,"model":"m"}'),
    ).toThrow("'choices' must be an array");
    expect(() =>
      parseChatStreamEvent(
        '{"object":"x","created":1,"model":"m","choices":[{"index":0,"delta":{"role":"robot"}}]}',
      ),
    ).toThrow("unknown role 'robot'");
  });
});
