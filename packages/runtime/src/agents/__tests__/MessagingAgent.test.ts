import { ErrorCode } from "@slack/web-api";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { RecordingPoster } from "../../testing/fakes.js";
import { MessagingAgent } from "../MessagingAgent.js";

describe("MessagingAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("parses every supported action grammar", () => {
    const agent = new MessagingAgent({ poster: new RecordingPoster() });

    expect(agent.parseAction('Post "Deploy finished" to #ops')).toEqual({
      channel: "#ops",
      message: "Deploy finished",
    });
    expect(agent.parseAction("post_message(channel='#ops', message='Deploy finished')")).toEqual({
      channel: "#ops",
      message: "Deploy finished",
    });
    expect(agent.parseAction("Post to #ops: Deploy finished")).toEqual({
      channel: "#ops",
      message: "Deploy finished",
    });
    expect(agent.parseAction("Tell the ops team we are done")).toBeNull();
  });

  it("posts a parsed action through the poster", async () => {
    const poster = new RecordingPoster();
    const agent = new MessagingAgent({ poster });

    const ts = await agent.run('Post "Hello team" to #general');

    expect(ts).toBe("1700000000.000100");
    expect(poster.posts).toEqual([{ channel: "#general", text: "Hello team" }]);
  });

  it("rejects actions that match no grammar", async () => {
    const agent = new MessagingAgent({ poster: new RecordingPoster() });

    await expect(agent.run("Say hello somewhere")).rejects.toMatchObject({
      code: "ActionUnparseable",
      message: 'Could not parse messaging action: "Say hello somewhere"',
    });
  });

  it("maps Slack platform errors to AdapterCallFailed", async () => {
    const poster = new RecordingPoster();
    poster.failWith = Object.assign(new Error("An API error occurred: channel_not_found"), {
      code: ErrorCode.PlatformError,
      data: { ok: false, error: "channel_not_found" },
    });
    const agent = new MessagingAgent({ poster });

    await expect(agent.post("#missing", "hi")).rejects.toMatchObject({
      code: "AdapterCallFailed",
      message: "Slack API error: channel_not_found",
      details: { channel: "#missing", reason: "channel_not_found" },
    });
  });

  it("maps transport failures to AdapterCallFailed", async () => {
    const poster = new RecordingPoster();
    poster.failWith = new Error("socket hang up");
    const agent = new MessagingAgent({ poster });

    await expect(agent.post("#general", "hi")).rejects.toMatchObject({
      code: "AdapterCallFailed",
      message: "Slack request failed: socket hang up",
    });
  });

  it("is unavailable without a bot token", async () => {
    const agent = new MessagingAgent({ botToken: null });

    expect(agent.isAvailable()).toBe(false);
    await expect(agent.post("#general", "hi")).rejects.toMatchObject({
      code: "AgentNotConfigured",
      message: "Messaging agent is not configured (missing Slack bot token)",
    });
  });
});
