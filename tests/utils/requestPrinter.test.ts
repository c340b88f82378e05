import { describe, it, expect } from "vitest";
import { HTTPMethod } from "../../src/types/api.types.js";
import {
  renderExchange,
  renderPayload,
} from "../../src/utils/requestPrinter.js";

describe("renderExchange", () => {
  it("renders a JSON request and response pretty-printed", () => {
    const dump = renderExchange(
      {
        url: "https://api.example.com/items",
        method: HTTPMethod.POST,
        headers: { "Content-Type": "application/json" },
        body: Buffer.from('{"a":1}'),
      },
      201,
      Buffer.from('{"ok":true}')
    );

    expect(dump).toBe(
      [
        "📤 REQUEST ↓",
        "🔸 Method: POST",
        "🌐 URL: https://api.example.com/items",
        "📦 Headers:",
        "   → Content-Type: application/json",
        "📝 Body:",
        "{",
        '  "a": 1',
        "}",
        "✅ Response (201):",
        "{",
        '  "ok": true',
        "}",
        "📤 END REQUEST ↑",
      ].join("\n")
    );
  });

  it("shows non-JSON text bodies raw and marks missing bodies", () => {
    const withText = renderExchange(
      {
        url: "https://api.example.com/form",
        method: HTTPMethod.PUT,
        headers: {},
        body: Buffer.from("k=v"),
      },
      200,
      Buffer.from("done")
    );
    expect(withText).toContain("📝 Body (raw):\nk=v\n✅ Response (200):\ndone\n");

    const withoutBody = renderExchange(
      { url: "https://api.example.com", method: HTTPMethod.GET, headers: {} },
      204,
      Buffer.alloc(0)
    );
    expect(withoutBody).toContain("📝 Body: (none)\n✅ Response (204):\n(empty)\n");
  });

  it("does not print binary payloads", () => {
    const dump = renderExchange(
      {
        url: "https://api.example.com/upload",
        method: HTTPMethod.POST,
        headers: {},
        body: Buffer.from([0xff, 0xd8, 0xff]),
      },
      500,
      Buffer.from([0xfe, 0x00])
    );

    expect(dump).toContain("📝 Body: (non-printable binary)\n");
    expect(dump).toContain("✅ Response (500):\n(non-printable binary)\n");
  });
});

describe("renderPayload", () => {
  it("distinguishes JSON, text and binary", () => {
    expect(renderPayload(Buffer.from("[1]"))).toEqual({
      text: "[\n  1\n]",
      raw: false,
    });
    expect(renderPayload(Buffer.from("hello"))).toEqual({
      text: "hello",
      raw: true,
    });
    expect(renderPayload(Buffer.from([0xc3]))).toBeUndefined();
  });
});
