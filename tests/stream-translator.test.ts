import { describe, it, expect } from "vitest";
import {
  DONE_FRAME,
  buildCompletion,
  extractContent,
  frameLine,
  translateUpstream,
} from "../src/services/streamTranslator.js";
import { WebhookTransportError } from "../src/services/webhookClient.js";
import type { UpstreamResult } from "../src/types/webhook.js";
import { parseFrame } from "./helpers/webhook-stub.js";

async function collect(result: UpstreamResult, model = "n8n-agent"): Promise<string[]> {
  const frames: string[] = [];
  for await (const frame of translateUpstream(result, model)) {
    frames.push(frame);
  }
  return frames;
}

async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}

describe("extractContent", () => {
  it("uses the content field", () => {
    expect(extractContent({ content: "hi", response: "ignored" })).toBe("hi");
  });

  it("keeps a present content field even when it is null", () => {
    expect(extractContent({ content: null, response: "ignored" })).toBeNull();
  });

  it("falls back to the response field", () => {
    expect(extractContent({ response: "from response" })).toBe("from response");
  });

  it("stringifies a reply without either field", () => {
    expect(extractContent({ output: "x", finish_reason: "stop" })).toBe(
      '{"output":"x","finish_reason":"stop"}',
    );
  });

  it("returns a plain-text reply unchanged", () => {
    expect(extractContent("plain text reply")).toBe("plain text reply");
  });

  it("stringifies arrays", () => {
    expect(extractContent([{ content: "nested" }])).toBe('[{"content":"nested"}]');
  });
});

describe("buildCompletion", () => {
  it("builds a chat.completion with zeroed usage", () => {
    const completion = buildCompletion({ content: "hi" }, "support-bot");

    expect(completion.id).toMatch(/^chatcmpl-[0-9a-f]{8}$/);
    expect(completion.object).toBe("chat.completion");
    expect(completion.model).toBe("support-bot");
    expect(Math.abs(completion.created - Date.now() / 1000)).toBeLessThan(5);
    expect(completion.choices).toEqual([
      {
        index: 0,
        message: { role: "assistant", content: "hi" },
        finish_reason: "stop",
      },
    ]);
    expect(completion.usage).toEqual({
      prompt_tokens: 0,
      completion_tokens: 0,
      total_tokens: 0,
    });
  });

  it("generates a fresh id per completion", () => {
    const first = buildCompletion({ content: "a" }, "m");
    const second = buildCompletion({ content: "a" }, "m");
    expect(first.id).not.toBe(second.id);
  });
});

describe("frameLine", () => {
  it("keeps an existing data prefix without doubling it", () => {
    expect(frameLine('data: {"content":"chunk1"}\n')).toBe('data: {"content":"chunk1"}\n\n');
  });

  it("wraps unframed lines", () => {
    expect(frameLine('{"content":"chunk1"}\n')).toBe('data: {"content":"chunk1"}\n\n');
  });

  it("strips trailing whitespace", () => {
    expect(frameLine("hello \t\r\n")).toBe("data: hello\n\n");
  });

  it("drops blank lines", () => {
    expect(frameLine("\n")).toBeNull();
    expect(frameLine("   \r\n")).toBeNull();
  });
});

describe("translateUpstream", () => {
  it("emits one completion frame then [DONE] for a buffered reply", async () => {
    const frames = await collect({ kind: "buffered", payload: { content: "hi" } });

    expect(frames).toHaveLength(2);
    expect(frames[0].startsWith("data: ")).toBe(true);
    expect(frames[0].endsWith("\n\n")).toBe(true);
    expect(parseFrame(frames[0])).toMatchObject({
      object: "chat.completion",
      model: "n8n-agent",
      choices: [{ index: 0, message: { role: "assistant", content: "hi" }, finish_reason: "stop" }],
    });
    expect(frames[1]).toBe(DONE_FRAME);
  });

  it("falls back to the response field in buffered replies", async () => {
    const frames = await collect({ kind: "buffered", payload: { response: "hello there" } });
    expect(parseFrame(frames[0])).toMatchObject({
      choices: [{ message: { content: "hello there" } }],
    });
  });

  it("emits exactly one error frame for an HTTP error", async () => {
    const frames = await collect({ kind: "http_error", status: 503, body: "overloaded" });
    expect(frames).toEqual(['data: {"error":"n8n webhook error: overloaded"}\n\n']);
  });

  it("labels connection failures", async () => {
    const frames = await collect({
      kind: "transport_error",
      errorKind: "connection",
      message: "connect ECONNREFUSED 127.0.0.1:5678",
    });
    expect(frames).toEqual([
      'data: {"error":"Connection error: connect ECONNREFUSED 127.0.0.1:5678"}\n\n',
    ]);
  });

  it("labels other failures as unexpected", async () => {
    const frames = await collect({
      kind: "transport_error",
      errorKind: "unexpected",
      message: "boom",
    });
    expect(frames).toEqual(['data: {"error":"Unexpected error: boom"}\n\n']);
  });

  it("relays streaming lines in order without adding [DONE]", async () => {
    const frames = await collect({
      kind: "streaming",
      lines: linesOf(
        'data: {"content":"chunk1","finish_reason":null}\n',
        "\n",
        '{"content":"chunk2","finish_reason":null}  \n',
        "",
        'data: {"content":"","finish_reason":"stop"}\n',
      ),
    });

    expect(frames).toEqual([
      'data: {"content":"chunk1","finish_reason":null}\n\n',
      'data: {"content":"chunk2","finish_reason":null}\n\n',
      'data: {"content":"","finish_reason":"stop"}\n\n',
    ]);
  });

  it("passes through the webhook's own [DONE]", async () => {
    const frames = await collect({
      kind: "streaming",
      lines: linesOf("data: hello\n", "\n", "data: [DONE]\n", "\n"),
    });
    expect(frames).toEqual(["data: hello\n\n", DONE_FRAME]);
  });

  it("ends with an error frame when the stream fails midway", async () => {
    async function* failing(): AsyncGenerator<string> {
      yield "first\n";
      throw new WebhookTransportError("other side closed", "connection");
    }

    const frames = await collect({ kind: "streaming", lines: failing() });
    expect(frames).toEqual([
      "data: first\n\n",
      'data: {"error":"Connection error: other side closed"}\n\n',
    ]);
  });

  it("treats unknown stream failures as unexpected", async () => {
    async function* failing(): AsyncGenerator<string> {
      yield* [];
      throw new TypeError("bad chunk");
    }

    const frames = await collect({ kind: "streaming", lines: failing() });
    expect(frames).toEqual(['data: {"error":"Unexpected error: bad chunk"}\n\n']);
  });
});
