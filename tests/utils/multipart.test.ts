import { describe, it, expect } from "vitest";
import {
  createBoundary,
  createMultipartBody,
  escapeDispositionValue,
  formatFieldValue,
  multipartContentType,
} from "../../src/utils/multipart.js";

describe("createMultipartBody", () => {
  it("writes parameter parts, file parts and the closing boundary", () => {
    const body = createMultipartBody(
      "XYZ",
      [
        {
          data: "ABC",
          fieldName: "f1",
          fileName: "a.jpg",
          mimeType: "image/jpeg",
        },
      ],
      { k: "v" }
    );

    expect(body.toString("utf8")).toBe(
      "--XYZ\r\n" +
        'Content-Disposition: form-data; name="k"\r\n\r\n' +
        "v\r\n" +
        "--XYZ\r\n" +
        'Content-Disposition: form-data; name="f1"; filename="a.jpg"\r\n' +
        "Content-Type: image/jpeg\r\n\r\n" +
        "ABC\r\n" +
        "--XYZ--\r\n"
    );
  });

  it("emits one part per file in order", () => {
    const body = createMultipartBody("B", [
      { data: "one", fieldName: "first", fileName: "x.png", mimeType: "image/png" },
      { data: "two", fieldName: "second", fileName: "x.png", mimeType: "image/png" },
    ]).toString("utf8");

    expect(body.indexOf('name="first"')).toBeLessThan(
      body.indexOf('name="second"')
    );
    expect(body.split("--B\r\n")).toHaveLength(3);
    expect(body.endsWith("--B--\r\n")).toBe(true);
  });

  it("copies binary file data byte for byte", () => {
    const bytes = Buffer.from([0xff, 0xd8, 0x00, 0x10]);
    const body = createMultipartBody("B", [
      { data: bytes, fieldName: "photo", fileName: "p.jpg", mimeType: "image/jpeg" },
    ]);

    const header = Buffer.from("Content-Type: image/jpeg\r\n\r\n", "utf8");
    const start = body.indexOf(header) + header.length;
    expect(body.subarray(start, start + bytes.length)).toEqual(bytes);
  });

  it("accepts Uint8Array data", () => {
    const body = createMultipartBody("B", [
      {
        data: new Uint8Array([0x41, 0x42]),
        fieldName: "f",
        fileName: "f.bin",
        mimeType: "application/octet-stream",
      },
    ]);

    expect(body.toString("utf8")).toContain("\r\n\r\nAB\r\n--B--\r\n");
  });

  it("escapes quotes and line breaks in disposition values", () => {
    const body = createMultipartBody(
      "B",
      [
        {
          data: "x",
          fieldName: 'up"load',
          fileName: 'a"b\r\nc.jpg',
          mimeType: "image/jpeg",
        },
      ],
      { "k\nx": "v" }
    ).toString("utf8");

    expect(body).toContain('Content-Disposition: form-data; name="k%0Ax"\r\n\r\nv\r\n');
    expect(body).toContain(
      'Content-Disposition: form-data; name="up%22load"; filename="a%22b%0D%0Ac.jpg"\r\n'
    );
  });

  it("produces only the closing boundary when there is nothing to send", () => {
    expect(createMultipartBody("B", []).toString("utf8")).toBe("--B--\r\n");
  });
});

describe("escapeDispositionValue", () => {
  it("leaves ordinary names alone", () => {
    expect(escapeDispositionValue("photo 1.jpg")).toBe("photo 1.jpg");
  });
});

describe("formatFieldValue", () => {
  it("renders scalars as text and structures as JSON", () => {
    expect(formatFieldValue("plain")).toBe("plain");
    expect(formatFieldValue(42)).toBe("42");
    expect(formatFieldValue(false)).toBe("false");
    expect(formatFieldValue(null)).toBe("null");
    expect(formatFieldValue({ a: [1, 2] })).toBe('{"a":[1,2]}');
  });
});

describe("boundaries", () => {
  it("creates unique UUID-based boundaries", () => {
    const first = createBoundary();
    expect(first).toMatch(/^Boundary-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(createBoundary()).not.toBe(first);
  });

  it("formats the content type header", () => {
    expect(multipartContentType("XYZ")).toBe(
      "multipart/form-data; boundary=XYZ"
    );
  });
});
