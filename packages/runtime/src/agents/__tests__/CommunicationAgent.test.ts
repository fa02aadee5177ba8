import { beforeEach, describe, expect, it, vi } from "vitest";
import { RecordingTelephony } from "../../testing/fakes.js";
import { CommunicationAgent, buildSayTwiml, type TelephonyClient } from "../CommunicationAgent.js";

describe("CommunicationAgent", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("sends an SMS from the configured number", async () => {
    const client = new RecordingTelephony();
    const agent = new CommunicationAgent({ client, fromNumber: "+15005550006" });

    await expect(agent.sendSms("+14155550100", "Running late")).resolves.toBe("SM-test-1");
    expect(client.messages).toEqual([
      { body: "Running late", from: "+15005550006", to: "+14155550100" },
    ]);
  });

  it("places a call that speaks the message", async () => {
    const client = new RecordingTelephony();
    const agent = new CommunicationAgent({ client, fromNumber: "+15005550006" });

    await expect(agent.makeCall("+14155550100", "Hello & bye")).resolves.toBe("CA-test-1");
    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.to).toBe("+14155550100");
    expect(client.calls[0]?.twiml).toBe(buildSayTwiml("Hello & bye"));
    expect(buildSayTwiml("Hello & bye")).toContain("<Say>Hello &amp; bye</Say>");
  });

  it("wraps provider failures", async () => {
    const client: TelephonyClient = {
      sendMessage: async () => {
        throw new Error("invalid number");
      },
      placeCall: async () => ({ sid: "unused" }),
    };
    const agent = new CommunicationAgent({ client, fromNumber: "+15005550006" });

    await expect(agent.sendSms("+14155550100", "hi")).rejects.toMatchObject({
      code: "AdapterCallFailed",
      message: "Twilio SMS request failed: invalid number",
      details: { recipient: "+14155550100" },
    });
  });

  it("is unavailable without a sender number", async () => {
    const agent = new CommunicationAgent({ accountSid: "ACtest", authToken: "test-secret" });

    expect(agent.isAvailable()).toBe(false);
    await expect(agent.makeCall("+14155550100", "hi")).rejects.toMatchObject({
      code: "AgentNotConfigured",
      message:
        "Communication agent is not configured (missing Twilio account SID, auth token or phone number)",
    });
  });
});
