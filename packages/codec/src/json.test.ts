import { describe, expect, it } from "vitest";
import { numberCodec, stringCodec } from "./codecs";
import { fromBytes, fromJson, toBytes, toJson } from "./json";
import { expectFailure, expectSuccess } from "./testing";
import { defineVariantCodec, single, tuple, unit } from "./variant";

const statusCodec = defineVariantCodec("Status", {
  idle: unit(),
  busy: single(stringCodec),
  progress: tuple(numberCodec, numberCodec),
});

describe("JSON text", () => {
  it("serializes the encoded structure", () => {
    expect(toJson(statusCodec, { type: "idle" })).toBe('{"idle":true}');
    expect(toJson(statusCodec, { type: "progress", data: [3, 10] })).toBe('{"progress":[3,10]}');
  });

  it("parses and decodes", () => {
    expect(expectSuccess(fromJson(statusCodec, '{"busy":"indexing"}'))).toEqual({ type: "busy", data: "indexing" });
  });

  it("reports unparsable text as corrupted data", () => {
    const error = expectFailure(fromJson(statusCodec, '{"busy":'));
    expect(error.code).toBe("DATA_CORRUPTED");
    expect(error.path).toEqual([]);
    expect(error.message.startsWith("Input for Status is not valid JSON")).toBe(true);
  });

  it("passes decode failures through unchanged", () => {
    expect(expectFailure(fromJson(statusCodec, '"idle"')).code).toBe("PAYLOAD_TYPE_MISMATCH");
  });
});

describe("UTF-8 bytes", () => {
  it("round-trips through bytes", () => {
    const bytes = toBytes(statusCodec, { type: "busy", data: "naïve" });
    expect(expectSuccess(fromBytes(statusCodec, bytes))).toEqual({ type: "busy", data: "naïve" });
  });

  it("rejects invalid UTF-8", () => {
    expect(expectFailure(fromBytes(statusCodec, new Uint8Array([0x7b, 0xff, 0x7d]))).code).toBe("DATA_CORRUPTED");
  });
});
