import { describe, it, expect } from "vitest";
import {
  TerseError,
  UnexpectedEmptyError,
  DomainError,
  ConfigError,
} from "../src/index.js";

describe("errors", () => {
  it("UnexpectedEmptyError has a default message", () => {
    const error = new UnexpectedEmptyError();
    expect(error.message).toBe("Unexpectedly found an empty value while unwrapping");
    expect(error.name).toBe("UnexpectedEmptyError");
    expect(error.kind).toBe("unexpected-empty");
  });

  it("every error extends TerseError and Error", () => {
    for (const error of [
      new UnexpectedEmptyError(),
      new DomainError("bad degree", "root"),
      new ConfigError("bad file"),
    ]) {
      expect(error).toBeInstanceOf(TerseError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it("DomainError records the operation", () => {
    const error = new DomainError("degree must be nonzero", "root");
    expect(error.operation).toBe("root");
    expect(error.kind).toBe("domain");
  });

  it("ConfigError keeps its cause and file path", () => {
    const cause = new SyntaxError("Unexpected token");
    const error = new ConfigError("Failed to load", "/tmp/.terserc", { cause });
    expect(error.cause).toBe(cause);
    expect(error.filePath).toBe("/tmp/.terserc");
    expect(error.kind).toBe("config");
  });
});
