import { describe, it, expect, vi } from "vitest";
import {
  filterRpcRequestHeaders,
  frameResponseHeaders,
  fromFetchHeaders,
  fromRawHeaders,
  getHeader,
  toFetchHeaders,
  toReplyHeaders,
  type HeaderSet,
} from "../src/rpc/headers.js";
import { silentObserver } from "../src/rpc/events.js";

describe("Header filter", () => {
  it("should keep receipt order and repeated names from raw headers", () => {
    expect(
      fromRawHeaders(["Accept", "a/b", "X-Trace", "1", "X-Trace", "2"])
    ).toEqual([
      ["Accept", "a/b"],
      ["X-Trace", "1"],
      ["X-Trace", "2"],
    ]);
  });

  it("should keep set-cookie values separate", () => {
    const source = new Headers();
    source.append("content-type", "application/json");
    source.append("set-cookie", "a=1");
    source.append("set-cookie", "b=2");
    expect(fromFetchHeaders(source)).toEqual([
      ["content-type", "application/json"],
      ["set-cookie", "a=1"],
      ["set-cookie", "b=2"],
    ]);
  });

  it("should drop content-length from RPC requests in any casing", () => {
    const headers: HeaderSet = [
      ["Content-Length", "120"],
      ["content-type", "application/json"],
      ["x-api-key", "test-key"],
    ];
    expect(filterRpcRequestHeaders(headers)).toEqual([
      ["content-type", "application/json"],
      ["x-api-key", "test-key"],
    ]);
  });

  describe("toFetchHeaders", () => {
    it("should leave transport-managed fields to the client", () => {
      const out = toFetchHeaders(
        [
          ["Host", "localhost:8545"],
          ["Connection", "keep-alive"],
          ["Content-Length", "10"],
          ["accept", "application/json"],
        ],
        silentObserver
      );
      expect([...out]).toEqual([["accept", "application/json"]]);
    });

    it("should skip a field the client rejects and keep the rest", () => {
      const observe = vi.fn();
      const out = toFetchHeaders(
        [
          ["bad name", "x"],
          ["x-ok", "1"],
        ],
        observe
      );
      expect(out.get("x-ok")).toBe("1");
      expect(observe).toHaveBeenCalledTimes(1);
      expect(observe.mock.calls[0][0]).toMatchObject({
        type: "header-skipped",
        direction: "outbound",
        name: "bad name",
      });
    });
  });

  describe("frameResponseHeaders", () => {
    it("should keep a matching content-length", () => {
      expect(
        frameResponseHeaders(
          [
            ["content-type", "application/json"],
            ["content-length", "5"],
          ],
          5,
          200
        )
      ).toEqual([
        ["content-type", "application/json"],
        ["content-length", "5"],
      ]);
    });

    it("should replace a stale content-length", () => {
      const framed = frameResponseHeaders(
        [
          ["Content-Length", "5"],
          ["content-type", "application/json"],
        ],
        9,
        200
      );
      expect(framed).toEqual([
        ["content-type", "application/json"],
        ["content-length", "9"],
      ]);
    });

    it("should add content-length when the destination sent none", () => {
      expect(getHeader(frameResponseHeaders([["x-a", "1"]], 3, 200), "Content-Length")).toBe("3");
    });

    it("should drop hop-by-hop fields and content-encoding", () => {
      expect(
        frameResponseHeaders(
          [
            ["connection", "keep-alive"],
            ["transfer-encoding", "chunked"],
            ["content-encoding", "gzip"],
            ["etag", "w/1"],
          ],
          0,
          200
        )
      ).toEqual([
        ["etag", "w/1"],
        ["content-length", "0"],
      ]);
    });

    it("should not add content-length to a 204", () => {
      expect(
        frameResponseHeaders(
          [
            ["content-length", "7"],
            ["x-request-id", "r1"],
          ],
          0,
          204
        )
      ).toEqual([["x-request-id", "r1"]]);
    });

    it("should keep the representation length on a 304 and add none", () => {
      expect(frameResponseHeaders([["etag", "w/2"]], 0, 304)).toEqual([["etag", "w/2"]]);
      expect(
        frameResponseHeaders(
          [
            ["etag", "w/2"],
            ["content-length", "120"],
          ],
          0,
          304
        )
      ).toEqual([
        ["etag", "w/2"],
        ["content-length", "120"],
      ]);
    });
  });

  describe("toReplyHeaders", () => {
    it("should group repeated names", () => {
      expect(
        toReplyHeaders(
          [
            ["Set-Cookie", "a=1"],
            ["set-cookie", "b=2"],
            ["x-one", "1"],
          ],
          silentObserver
        )
      ).toEqual({ "set-cookie": ["a=1", "b=2"], "x-one": "1" });
    });

    it("should skip values the server cannot emit", () => {
      const observe = vi.fn();
      expect(
        toReplyHeaders(
          [
            ["x-bad", "line\nbreak"],
            ["x-good", "ok"],
          ],
          observe
        )
      ).toEqual({ "x-good": "ok" });
      expect(observe.mock.calls[0][0]).toMatchObject({
        type: "header-skipped",
        direction: "inbound",
        name: "x-bad",
      });
    });
  });
});
