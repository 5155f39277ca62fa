import { describe, expect, it } from "vitest";
import { ConfParseError } from "../../errors.js";
import { isWritableKey, isWritableValue, parseLine, splitLines } from "../line.js";

describe("parseLine", () => {
  it("classifies blank and whitespace-only lines as empty", () => {
    expect(parseLine("", 1)).toEqual({ kind: "empty" });
    expect(parseLine("   \t ", 1)).toEqual({ kind: "empty" });
  });

  it("keeps comment text verbatim", () => {
    expect(parseLine("# header", 1)).toEqual({ kind: "comment", text: "# header" });
    expect(parseLine("   # indented comment", 1)).toEqual({ kind: "comment", text: "   # indented comment" });
  });

  it("parses unquoted settings", () => {
    expect(parseLine("heartbeat = 60", 1)).toEqual({ kind: "setting", key: "heartbeat", value: "60" });
    expect(parseLine("listeners.tcp.default=5672", 1)).toEqual({
      kind: "setting",
      key: "listeners.tcp.default",
      value: "5672",
    });
    expect(parseLine("\tlisteners.tcp.default\t=\t5672\t", 1)).toEqual({
      kind: "setting",
      key: "listeners.tcp.default",
      value: "5672",
    });
  });

  it("drops inline comments and trailing whitespace from unquoted values", () => {
    expect(parseLine("listeners.tcp.default = 5672 # default port", 1)).toEqual({
      kind: "setting",
      key: "listeners.tcp.default",
      value: "5672",
    });
    expect(parseLine("key = value#comment", 1)).toEqual({ kind: "setting", key: "key", value: "value" });
    expect(parseLine("key = value   ", 1)).toEqual({ kind: "setting", key: "key", value: "value" });
  });

  it("keeps equals signs and dots inside unquoted values", () => {
    expect(parseLine("some.key = value=with=equals", 1)).toEqual({
      kind: "setting",
      key: "some.key",
      value: "value=with=equals",
    });
    expect(parseLine("some.key = value.with.dots", 1)).toEqual({
      kind: "setting",
      key: "some.key",
      value: "value.with.dots",
    });
  });

  it("allows an empty value", () => {
    expect(parseLine("key =", 1)).toEqual({ kind: "setting", key: "key", value: "" });
    expect(parseLine("key = ''", 1)).toEqual({ kind: "setting", key: "key", value: "" });
  });

  it("reads quoted values literally up to the closing quote", () => {
    expect(parseLine("cluster_name = 'my cluster'", 1)).toEqual({
      kind: "setting",
      key: "cluster_name",
      value: "my cluster",
    });
    expect(parseLine("cluster_name = 'my#cluster'", 1)).toEqual({
      kind: "setting",
      key: "cluster_name",
      value: "my#cluster",
    });
    expect(parseLine("key = 'value # not comment'   # real comment", 1)).toEqual({
      kind: "setting",
      key: "key",
      value: "value # not comment",
    });
    expect(parseLine("key = 'v'#c", 1)).toEqual({ kind: "setting", key: "key", value: "v" });
  });

  it("reads quoted values that contain quotes", () => {
    expect(parseLine("key = 'it's'", 1)).toEqual({ kind: "setting", key: "key", value: "it's" });
    expect(parseLine("key = 'a'b # c' # note", 1)).toEqual({ kind: "setting", key: "key", value: "a'b # c" });
  });

  it("keeps an unclosed quote as part of an unquoted value", () => {
    expect(parseLine("key = 'unterminated value", 1)).toEqual({
      kind: "setting",
      key: "key",
      value: "'unterminated value",
    });
    expect(parseLine("key = 'a' b", 1)).toEqual({ kind: "setting", key: "key", value: "'a' b" });
  });

  it("rejects lines without a key and equals sign", () => {
    expect(() => parseLine("not a setting", 3)).toThrow("parse error at line 3: invalid line: not a setting");
    expect(() => parseLine("= value", 1)).toThrow("parse error at line 1: invalid line: = value");
  });

  it("rejects hyphens at the tokenizer level", () => {
    expect(() => parseLine("some-key = 1", 2)).toThrow("parse error at line 2: invalid line: some-key = 1");
  });

  it("rejects malformed keys with the line number", () => {
    let caught: unknown;
    try {
      parseLine("1listeners = x", 7);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfParseError);
    if (caught instanceof ConfParseError) {
      expect(caught.line).toBe(7);
      expect(caught.detail).toBe("invalid key format: 1listeners");
      expect(caught.message).toBe("parse error at line 7: invalid key format: 1listeners");
    }
    expect(() => parseLine("listeners..tcp = 1", 1)).toThrow("invalid key format: listeners..tcp");
  });
});

describe("isWritableKey", () => {
  it("accepts keys a setting line can hold", () => {
    expect(isWritableKey("listeners.tcp.default")).toBe(true);
    expect(isWritableKey("cluster_formation.classic_config.nodes.1")).toBe(true);
  });

  it("rejects hyphenated and malformed keys", () => {
    expect(isWritableKey("listeners.tcp.my-listener")).toBe(false);
    expect(isWritableKey("listeners..tcp")).toBe(false);
    expect(isWritableKey("")).toBe(false);
  });
});

describe("isWritableValue", () => {
  it("rejects line breaks only", () => {
    expect(isWritableValue("my cluster # 'x'")).toBe(true);
    expect(isWritableValue("")).toBe(true);
    expect(isWritableValue("a\nb")).toBe(false);
    expect(isWritableValue("a\rb")).toBe(false);
  });
});

describe("splitLines", () => {
  it("returns no lines for empty content", () => {
    expect(splitLines("")).toEqual([]);
  });

  it("does not start a line after the final terminator", () => {
    expect(splitLines("a\n")).toEqual(["a"]);
    expect(splitLines("a")).toEqual(["a"]);
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
    expect(splitLines("\n")).toEqual([""]);
  });

  it("drops carriage returns", () => {
    expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
  });
});
