import { describe, it, expect } from "vitest";
import { CHIPS, parseTargets } from "./chip";
import { TargetParseError } from "../errors";

function parseError(input: string): TargetParseError {
  try {
    parseTargets(input);
  } catch (error) {
    if (error instanceof TargetParseError) return error;
    throw error;
  }
  throw new Error(`expected parseTargets("${input}") to fail`);
}

describe("parseTargets", () => {
  it.each(CHIPS)("parses the single target %s", (chip) => {
    expect(parseTargets(chip)).toEqual([chip]);
  });

  it("keeps input order", () => {
    expect(parseTargets("esp32,esp32c3")).toEqual(["esp32", "esp32c3"]);
    expect(parseTargets("esp32c3,esp32")).toEqual(["esp32c3", "esp32"]);
  });

  it("splits on commas and whitespace", () => {
    expect(parseTargets(" esp32s2, esp32s3  esp32 ")).toEqual(["esp32s2", "esp32s3", "esp32"]);
  });

  it("is case-insensitive", () => {
    expect(parseTargets("ESP32,Esp32C3")).toEqual(["esp32", "esp32c3"]);
  });

  it("drops duplicates", () => {
    expect(parseTargets("esp32,esp32,esp32c3,esp32")).toEqual(["esp32", "esp32c3"]);
  });

  it("expands all to the canonical set", () => {
    expect(parseTargets("all")).toEqual(["esp32", "esp32s2", "esp32s3", "esp32c3"]);
  });

  it("ignores other tokens next to all, including unknown ones", () => {
    expect(parseTargets("esp32c3,all")).toEqual(["esp32", "esp32s2", "esp32s3", "esp32c3"]);
    expect(parseTargets("esp8266 all")).toEqual(["esp32", "esp32s2", "esp32s3", "esp32c3"]);
  });

  it("only treats the whole token as all", () => {
    expect(parseError("small").token).toBe("small");
  });

  it("fails on the first unknown token without partial results", () => {
    const error = parseError("esp32,esp8266,esp32h2");

    expect(error.errorCode).toBe("UNKNOWN_TARGET");
    expect(error.token).toBe("esp8266");
    expect(error.message).toBe("Unknown target: esp8266");
  });

  it("fails on empty input", () => {
    const error = parseError(" , ");

    expect(error.errorCode).toBe("EMPTY_TARGETS");
    expect(error.message).toBe("No targets specified");
  });
});
