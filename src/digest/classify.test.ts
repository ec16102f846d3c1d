import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@trigger.dev/sdk/v3", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { logger } from "@trigger.dev/sdk/v3";
import { buildClassifierPrompt, classifyAll, classifyRecord } from "./classify.js";
import { fakeModel, promptLine, record, testDeps, testSettings } from "../testing/fakes.js";

beforeEach(() => {
  vi.clearAllMocks();
});

describe("buildClassifierPrompt", () => {
  it("fills labels, headers, and a truncated body", () => {
    const deps = testDeps(fakeModel(() => ""), {
      ...testSettings,
      classifier: { ...testSettings.classifier, bodyChars: 4 },
    });
    const prompt = buildClassifierPrompt(record("m1", "Party", "abcdefgh"), deps);
    expect(prompt).toBe(
      "CLASSIFY\nLabels: social_events, individual_outreach, job_postings, other\nSubject: Party\nFrom: m1@example.com\nabcd"
    );
  });
});

describe("classifyRecord", () => {
  it("accepts a mixed-case exact label", async () => {
    const model = fakeModel(() => "Social_Events\n");
    const outcome = await classifyRecord(record("m1"), testDeps(model));
    expect(outcome).toEqual({ id: "m1", label: "social_events", status: "ok" });
    expect(model.calls[0].options).toEqual({ maxOutputTokens: 20, temperature: 0 });
  });

  it("coerces a reply outside the taxonomy to the catch-all", async () => {
    const outcome = await classifyRecord(record("m2"), testDeps(fakeModel(() => "social events")));
    expect(outcome).toEqual({ id: "m2", label: "other", status: "coerced" });
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it("maps a failed call to the catch-all without rejecting", async () => {
    const model = fakeModel(() => {
      throw new Error("rate limited");
    });
    const outcome = await classifyRecord(record("m3"), testDeps(model));
    expect(outcome).toEqual({ id: "m3", label: "other", status: "failed", error: "rate limited" });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("reports a literal catch-all reply as ok", async () => {
    const outcome = await classifyRecord(record("m4"), testDeps(fakeModel(() => "other")));
    expect(outcome.status).toBe("ok");
  });
});

describe("classifyAll", () => {
  it("keeps record order and isolates failures", async () => {
    const model = fakeModel((prompt) => {
      const subject = promptLine(prompt, "Subject");
      if (subject === "boom") throw new Error("server error");
      return subject;
    });
    const records = [
      record("a", "job_postings"),
      record("b", "boom"),
      record("c", "individual_outreach"),
      record("d", "nonsense"),
    ];
    const outcomes = await classifyAll(records, testDeps(model));
    expect(outcomes.map((o) => [o.id, o.label, o.status])).toEqual([
      ["a", "job_postings", "ok"],
      ["b", "other", "failed"],
      ["c", "individual_outreach", "ok"],
      ["d", "other", "coerced"],
    ]);
    expect(model.calls).toHaveLength(4);
  });

  it("makes no calls for no records", async () => {
    const model = fakeModel(() => "other");
    await expect(classifyAll([], testDeps(model))).resolves.toEqual([]);
    expect(model.calls).toHaveLength(0);
  });
});
