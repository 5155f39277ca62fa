import { describe, expect, it } from "vitest";
import { parseBoolean, parseFloatValue, parseInteger } from "../coerce.js";

describe("parseBoolean", () => {
  it.each(["true", "on", "yes", "1"])("reads %s as true", (value) => {
    expect(parseBoolean(value)).toBe(true);
  });

  it.each(["false", "off", "no", "0"])("reads %s as false", (value) => {
    expect(parseBoolean(value)).toBe(false);
  });

  it.each(["True", "YES", "y", "2", "", " true"])("does not read %j", (value) => {
    expect(parseBoolean(value)).toBeUndefined();
  });
});

describe("parseInteger", () => {
  it("parses signed decimal integers", () => {
    expect(parseInteger("5672")).toBe(5672);
    expect(parseInteger("-42")).toBe(-42);
    expect(parseInteger("+7")).toBe(7);
  });

  it("rejects anything else", () => {
    expect(parseInteger("1.5")).toBeUndefined();
    expect(parseInteger("abc")).toBeUndefined();
    expect(parseInteger(" 5")).toBeUndefined();
    expect(parseInteger("")).toBeUndefined();
    expect(parseInteger("0x10")).toBeUndefined();
  });

  it("rejects integers beyond the safe range", () => {
    expect(parseInteger("9007199254740991")).toBe(9007199254740991);
    expect(parseInteger("9007199254740993")).toBeUndefined();
  });
});

describe("parseFloatValue", () => {
  it("parses decimal numbers", () => {
    expect(parseFloatValue("3.14")).toBe(3.14);
    expect(parseFloatValue("42")).toBe(42);
    expect(parseFloatValue("-0.5")).toBe(-0.5);
    expect(parseFloatValue(".5")).toBe(0.5);
    expect(parseFloatValue("5.")).toBe(5);
    expect(parseFloatValue("1e3")).toBe(1000);
  });

  it("rejects non-numbers and overflow", () => {
    expect(parseFloatValue("abc")).toBeUndefined();
    expect(parseFloatValue("")).toBeUndefined();
    expect(parseFloatValue("NaN")).toBeUndefined();
    expect(parseFloatValue("1e400")).toBeUndefined();
    expect(parseFloatValue("0.4GB")).toBeUndefined();
  });
});
