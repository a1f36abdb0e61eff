import { describe, expect, it, vi } from "vitest";
import { fromJson, toJson } from "@keyed-union/codec";
import { expectFailure, expectSuccess } from "@keyed-union/codec/testing";
import { createViewStateCodec, ViewState, viewStateCodec } from "./viewState";

const SELECTED_ID = "5f0c2d7e-8a41-4b6e-9c3d-1e2f3a4b5c6d";

const connection = {
  url: "wss://stocks.example.test",
  messages: ["connected", "disconnected"],
};

const allStates: ViewState[] = [
  ViewState.empty(),
  ViewState.editing("headers"),
  ViewState.exchangeHistory(connection),
  ViewState.exchangeHistory(null),
  ViewState.list(SELECTED_ID, [{ name: "Request 1" }, { name: "Request 2" }]),
];

describe("ViewState wire format", () => {
  it("encodes empty as a true marker", () => {
    expect(viewStateCodec.encode(ViewState.empty())).toEqual({ empty: true });
    expect(expectSuccess(viewStateCodec.decode({ empty: true }))).toEqual(ViewState.empty());
  });

  it("encodes editing with the bare subview", () => {
    expect(viewStateCodec.encode(ViewState.editing("body"))).toEqual({ editing: "body" });
    expect(expectSuccess(viewStateCodec.decode({ editing: "body" }))).toEqual(ViewState.editing("body"));
  });

  it("encodes the exchange history connection as a nested object", () => {
    expect(viewStateCodec.encode(ViewState.exchangeHistory(connection))).toEqual({
      exchangeHistory: { url: "wss://stocks.example.test", messages: ["connected", "disconnected"] },
    });
  });

  it("encodes an absent connection as null and decodes it back", () => {
    const encoded = viewStateCodec.encode(ViewState.exchangeHistory(null));
    expect(encoded).toEqual({ exchangeHistory: null });
    expect(expectSuccess(viewStateCodec.decode(encoded))).toEqual({ type: "exchangeHistory", data: null });
  });

  it("packs the list selection and items into one array", () => {
    const state = ViewState.list(SELECTED_ID, [{ name: "Request 1" }]);
    expect(viewStateCodec.encode(state)).toEqual({ list: [SELECTED_ID, [{ name: "Request 1" }]] });

    const decoded = expectSuccess(viewStateCodec.decode({ list: [SELECTED_ID, [{ name: "Request 1" }]] }));
    expect(decoded).toEqual({ type: "list", data: [SELECTED_ID, [{ name: "Request 1" }]] });
  });

  it("round-trips every state through JSON text", () => {
    for (const state of allStates) {
      const text = toJson(viewStateCodec, state);
      expect(Object.keys(JSON.parse(text))).toHaveLength(1);
      expect(expectSuccess(fromJson(viewStateCodec, text))).toEqual(state);
    }
  });
});

describe("ViewState ownership", () => {
  it("decodes expanded items into new arrays and objects", () => {
    const items = [{ name: "Request 1" }, { name: "Request 2" }];
    const decoded = expectSuccess(viewStateCodec.decode({ list: [SELECTED_ID, items] }));
    if (decoded.type !== "list") throw new Error(`unexpected variant ${decoded.type}`);

    const [selectedId, expandedItems] = decoded.data;
    expect(selectedId).toBe(SELECTED_ID);
    expect(expandedItems).not.toBe(items);
    expect(expandedItems).toEqual(items);
    expandedItems.forEach((item, index) => expect(item).not.toBe(items[index]));
  });

  it("decodes the connection into a new object", () => {
    const input = { url: "wss://stocks.example.test", messages: ["connected"] };
    const decoded = expectSuccess(viewStateCodec.decode({ exchangeHistory: input }));
    if (decoded.type !== "exchangeHistory") throw new Error(`unexpected variant ${decoded.type}`);

    expect(decoded.data).not.toBe(input);
    expect(decoded.data?.messages).not.toBe(input.messages);
    expect(decoded.data).toEqual(input);
  });
});

describe("ViewState rejection", () => {
  it("fails a list with only one packed value", () => {
    const error = expectFailure(viewStateCodec.decode({ list: [SELECTED_ID] }));
    expect(error.code).toBe("TRUNCATED_SEQUENCE");
    expect(error.details).toEqual({ expected: 2, actual: 1 });
  });

  it("fails when two states are present at once", () => {
    expect(expectFailure(viewStateCodec.decode({ empty: true, editing: "body" })).code).toBe(
      "AMBIGUOUS_OR_MISSING_DISCRIMINATOR",
    );
  });

  it("fails on an empty container", () => {
    expect(expectFailure(viewStateCodec.decode({})).code).toBe("AMBIGUOUS_OR_MISSING_DISCRIMINATOR");
  });

  it("fails on an unknown state", () => {
    expect(expectFailure(viewStateCodec.decode({ settings: true })).code).toBe("UNKNOWN_DISCRIMINATOR");
  });

  it("fails on an undeclared subview", () => {
    const error = expectFailure(viewStateCodec.decode({ editing: "cookies" }));
    expect(error.code).toBe("PAYLOAD_TYPE_MISMATCH");
    expect(error.path).toEqual(["editing"]);
  });

  it("points at the bad field inside an expanded item", () => {
    const error = expectFailure(viewStateCodec.decode({ list: [SELECTED_ID, [{ name: "ok" }, { name: 2 }]] }));
    expect(error.path).toEqual(["list", 1, 1, "name"]);
  });

  it("fails on a malformed selection id", () => {
    const error = expectFailure(viewStateCodec.decode({ list: ["row-7", []] }));
    expect(error.code).toBe("PAYLOAD_TYPE_MISMATCH");
    expect(error.path).toEqual(["list", 0]);
  });

  it("fails on a connection without a valid url", () => {
    const error = expectFailure(viewStateCodec.decode({ exchangeHistory: { url: "stocks", messages: [] } }));
    expect(error.path).toEqual(["exchangeHistory", "url"]);
  });
});

describe("createViewStateCodec", () => {
  it("forwards options to the packed list payload", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const strict = createViewStateCodec({ logger, trailingElements: "reject" });

    const error = expectFailure(strict.decode({ list: [SELECTED_ID, [], "extra"] }));
    expect(error.code).toBe("TRAILING_ELEMENTS");
    expect(logger.debug).toHaveBeenCalledWith("decoding variant", {
      codec: "ViewState",
      path: [],
      key: "list",
      arity: "tuple",
    });
  });
});
