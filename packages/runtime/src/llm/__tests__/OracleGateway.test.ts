import { beforeEach, describe, expect, it, vi } from "vitest";
import type { PromptTemplate } from "../../types/index.js";
import type {
  ChatCompletionClient,
  ChatCompletionOptions,
  ChatMessage,
} from "../ChatModelClient.js";
import { OracleGateway, renderTemplate, stripCodeFences } from "../OracleGateway.js";
import { KNOWLEDGE_ANSWER_TEMPLATE } from "../prompts.js";

class ScriptedClient implements ChatCompletionClient {
  public readonly requests: Array<{ messages: ChatMessage[]; options?: ChatCompletionOptions }> =
    [];

  constructor(private readonly reply: string, private readonly configured = true) {}

  public isConfigured(): boolean {
    return this.configured;
  }

  public async complete(messages: ChatMessage[], options?: ChatCompletionOptions) {
    this.requests.push({ messages, options });
    return this.reply;
  }
}

const TEMPLATE: PromptTemplate = {
  name: "extract",
  system: "Reply with JSON only.",
  text: 'Text: "{action_text}"',
};

describe("OracleGateway", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  it("renders the template and parses fenced JSON", async () => {
    const client = new ScriptedClient('```json\n{"channel": "#general", "message": "hi"}\n```');
    const oracle = new OracleGateway({ client });

    const result = await oracle.askStructured(TEMPLATE, { action_text: "say hi on general" });

    expect(result).toEqual({ channel: "#general", message: "hi" });
    expect(client.requests[0]?.messages).toEqual([
      { role: "system", content: "Reply with JSON only." },
      { role: "user", content: 'Text: "say hi on general"' },
    ]);
    expect(client.requests[0]?.options).toEqual({ temperature: 0.2 });
  });

  it("reports unparseable structured output with the raw text", async () => {
    const oracle = new OracleGateway({ client: new ScriptedClient("Sure! Here is your plan.") });

    const failure = oracle.askStructured(TEMPLATE, { action_text: "x" });

    await expect(failure).rejects.toMatchObject({
      code: "OraclePlanMalformed",
      details: { raw: "Sure! Here is your plan." },
    });
  });

  it("returns trimmed text in text mode without a system message when the template has none", async () => {
    const client = new ScriptedClient("  Paris is the capital.  ");
    const oracle = new OracleGateway({ client, maxTokens: 200 });

    const answer = await oracle.askText(KNOWLEDGE_ANSWER_TEMPLATE, {
      knowledge: "Paris is the capital of France.",
      query: "What is the capital?",
    });

    expect(answer).toBe("Paris is the capital.");
    expect(client.requests[0]?.messages).toEqual([
      {
        role: "user",
        content:
          "Context:\nParis is the capital of France.\n\nQuestion: What is the capital?\n\nAnswer based only on the context:",
      },
    ]);
    expect(client.requests[0]?.options).toEqual({ temperature: 0.2, maxTokens: 200 });
  });

  it("delegates isConfigured to the client", () => {
    expect(new OracleGateway({ client: new ScriptedClient("", false) }).isConfigured()).toBe(false);
  });
});

describe("renderTemplate", () => {
  it("throws when a variable is missing", () => {
    expect(() => renderTemplate(TEMPLATE, {})).toThrowError(
      'Prompt template "extract" references missing variable "action_text"'
    );
  });
});

describe("stripCodeFences", () => {
  it("removes plain and json fences in any case", () => {
    expect(stripCodeFences("```\n[1]\n```")).toBe("[1]");
    expect(stripCodeFences("  ```JSON\n{\"a\": 1}\n```  ")).toBe('{"a": 1}');
    expect(stripCodeFences('{"a": 1}')).toBe('{"a": 1}');
  });
});
