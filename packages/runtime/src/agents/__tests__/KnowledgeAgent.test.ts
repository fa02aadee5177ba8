import { mkdtemp, readFile, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FakeOracle } from "../../testing/fakes.js";
import {
  EMPTY_KNOWLEDGE_ANSWER,
  KnowledgeAgent,
  sanitizeKnowledgeName,
} from "../KnowledgeAgent.js";

describe("KnowledgeAgent", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "knowledge-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("answers from an empty corpus without asking the oracle", async () => {
    const oracle = new FakeOracle();
    const agent = new KnowledgeAgent({ directory: path.join(directory, "missing"), oracle });

    await expect(agent.run("anything")).resolves.toBe(EMPTY_KNOWLEDGE_ANSWER);
    expect(oracle.calls).toEqual([]);
  });

  it("stores knowledge under a sanitized name and sees it on the next query", async () => {
    const oracle = new FakeOracle({ "knowledge-answer": "hello back" });
    const agent = new KnowledgeAgent({ directory, oracle });

    await expect(agent.run("greeting?")).resolves.toBe(EMPTY_KNOWLEDGE_ANSWER);
    const message = await agent.addKnowledge("My File!", "  hello  ");

    expect(message).toBe("Knowledge stored in My_File_.txt");
    expect(await readFile(path.join(directory, "My_File_.txt"), "utf8")).toBe("hello\n");
    await expect(agent.run("greeting?")).resolves.toBe("hello back");
    expect(oracle.calls).toEqual([
      {
        template: "knowledge-answer",
        variables: { knowledge: "hello\n", query: "greeting?" },
        mode: "text",
      },
    ]);
  });

  it("joins units in file name order", async () => {
    const agent = new KnowledgeAgent({ directory, oracle: new FakeOracle() });

    await agent.addKnowledge("b", "second");
    await agent.addKnowledge("a", "first");

    await expect(agent.getCorpus()).resolves.toBe("first\n\n\nsecond\n");
  });

  it("returns the rendered prompt when the oracle is not configured", async () => {
    const oracle = new FakeOracle({}, false);
    const agent = new KnowledgeAgent({ directory, oracle });
    await agent.addKnowledge("facts", "Sky is blue.");

    await expect(agent.run("Sky colour?")).resolves.toBe(
      "(LLM not configured) Context:\nSky is blue.\n\n\nQuestion: Sky colour?\n\nAnswer based only on the context:"
    );
    expect(oracle.calls).toEqual([]);
  });
});

describe("sanitizeKnowledgeName", () => {
  it("replaces characters outside letters, digits, dash and underscore", () => {
    expect(sanitizeKnowledgeName("../etc/passwd")).toBe("___etc_passwd");
    expect(sanitizeKnowledgeName("team-notes_2")).toBe("team-notes_2");
  });
});
