import { describe, it, expect } from "vitest";
import { encodeRawEmail, isInvalidGrantError } from "./client.js";

function decode(raw: string): string {
  return Buffer.from(raw, "base64url").toString("utf-8");
}

describe("encodeRawEmail", () => {
  it("builds a URL-safe base64 RFC 2822 message", () => {
    const raw = encodeRawEmail({ to: "me@example.com", subject: "Digest", text: "Hello" });
    expect(raw).not.toMatch(/[+/=]/);
    expect(decode(raw)).toBe(
      [
        "To: me@example.com",
        "Subject: Digest",
        "MIME-Version: 1.0",
        'Content-Type: text/plain; charset="UTF-8"',
        "Content-Transfer-Encoding: base64",
        "",
        Buffer.from("Hello", "utf-8").toString("base64"),
      ].join("\r\n")
    );
  });

  it("encodes a non-ASCII subject as an RFC 2047 word", () => {
    const raw = encodeRawEmail({ to: "me@example.com", subject: "Café", text: "x" });
    const subjectLine = decode(raw).split("\r\n")[1];
    expect(subjectLine).toBe(`Subject: =?UTF-8?B?${Buffer.from("Café", "utf-8").toString("base64")}?=`);
  });
});

describe("isInvalidGrantError", () => {
  it("detects invalid_grant in the message or the response body", () => {
    expect(isInvalidGrantError(new Error("invalid_grant"))).toBe(true);
    expect(isInvalidGrantError({ response: { data: { error: "invalid_grant" } } })).toBe(true);
    expect(isInvalidGrantError(new Error("quota exceeded"))).toBe(false);
    expect(isInvalidGrantError(null)).toBe(false);
  });
});
