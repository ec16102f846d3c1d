import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@trigger.dev/sdk/v3", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { logger } from "@trigger.dev/sdk/v3";
import {
  buildDigestPrompt,
  buildEmailBlocks,
  digestFailureText,
  summarizeAll,
  summarizeGroup,
} from "./summarize.js";
import { fakeModel, testDeps, testSettings } from "../testing/fakes.js";
import type { ExtractedRecord } from "../types/pipeline.js";

const s1: ExtractedRecord = { id: "1", subject: "S1", sender: "a@x", body: "Hello world" };
const s2: ExtractedRecord = { id: "2", subject: "S2", sender: "b@x", body: "Hi" };

beforeEach(() => {
  vi.clearAllMocks();
});

describe("buildEmailBlocks", () => {
  it("numbers each email and cuts bodies to bodyChars", () => {
    const settings = { digest: { ...testSettings.digest, bodyChars: 5 } };
    expect(buildEmailBlocks([s1, s2], settings)).toBe(
      "--- Email 1 ---\nSubject: S1\nFrom: a@x\n\nHello\n\n--- Email 2 ---\nSubject: S2\nFrom: b@x\n\nHi"
    );
  });

  it("caps the whole block and appends the marker", () => {
    const settings = {
      digest: { ...testSettings.digest, maxPromptChars: 20, truncationMarker: "[cut]" },
    };
    expect(buildEmailBlocks([s1, s2], settings)).toBe("--- Email 1 ---\nSubj\n\n[cut]");
  });

  it("backs off a unit when the cap falls inside a surrogate pair", () => {
    const emoji: ExtractedRecord = { id: "3", subject: "\u{1F600}", sender: "c@x", body: "" };
    const settings = {
      digest: { ...testSettings.digest, maxPromptChars: 26, truncationMarker: "[cut]" },
    };
    expect(buildEmailBlocks([emoji], settings)).toBe("--- Email 1 ---\nSubject: \n\n[cut]");
  });

  it("leaves text at exactly the cap alone", () => {
    const exact = buildEmailBlocks([s2], { digest: testSettings.digest });
    const settings = { digest: { ...testSettings.digest, maxPromptChars: exact.length } };
    expect(buildEmailBlocks([s2], settings)).toBe(exact);
  });
});

describe("buildDigestPrompt", () => {
  const deps = testDeps(fakeModel(() => ""));

  it("picks the template for the topic's family", () => {
    const prompt = buildDigestPrompt({ label: "job_postings", records: [s1, s2] }, deps);
    expect(prompt.split("\n")[0]).toBe("DIGEST postings Job Postings 2");
  });

  it("uses the catch-all template for an unknown label", () => {
    const prompt = buildDigestPrompt({ label: "mystery", records: [s2] }, deps);
    expect(prompt.split("\n")[0]).toBe("DIGEST general Other 1");
  });
});

describe("summarizeGroup", () => {
  it("returns trimmed model text", async () => {
    const model = fakeModel(() => "  - Party on Friday\n");
    const digest = await summarizeGroup({ label: "social_events", records: [s1] }, testDeps(model));
    expect(digest).toEqual({
      label: "social_events",
      title: "Social Events",
      recordCount: 1,
      text: "- Party on Friday",
      degraded: false,
    });
    expect(model.calls[0].options).toEqual({ maxOutputTokens: 800 });
  });

  it("degrades to an error digest when the model fails", async () => {
    const model = fakeModel(() => {
      throw new Error("boom");
    });
    const digest = await summarizeGroup(
      { label: "social_events", records: [s1, s2] },
      testDeps(model)
    );
    expect(digest).toEqual({
      label: "social_events",
      title: "Social Events",
      recordCount: 2,
      text: "Error generating digest for Social Events (social_events): boom",
      degraded: true,
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe("digestFailureText", () => {
  it("names the topic and the error", () => {
    expect(digestFailureText("Other", "other", "timeout")).toBe(
      "Error generating digest for Other (other): timeout"
    );
  });
});

describe("summarizeAll", () => {
  it("keeps group order when one group fails", async () => {
    const model = fakeModel((prompt) => {
      if (prompt.startsWith("DIGEST outreach")) throw new Error("overloaded");
      return prompt.split("\n")[0];
    });
    const digests = await summarizeAll(
      [
        { label: "other", records: [s1] },
        { label: "individual_outreach", records: [s2] },
        { label: "social_events", records: [s1, s2] },
      ],
      testDeps(model)
    );
    expect(digests.map((d) => [d.label, d.degraded, d.text])).toEqual([
      ["other", false, "DIGEST general Other 1"],
      [
        "individual_outreach",
        true,
        "Error generating digest for Individual Outreach (individual_outreach): overloaded",
      ],
      ["social_events", false, "DIGEST events Social Events 2"],
    ]);
  });
});
