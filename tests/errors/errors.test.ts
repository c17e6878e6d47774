import { describe, expect, it } from "vitest";
import {
  LinterError,
  arithmeticError,
  configurationError,
  renderError,
  toLinterError,
  usageError,
} from "../../src/errors/linter-error.js";

describe("linter errors", () => {
  it("renders usage errors as the bare usage line", () => {
    expect(renderError(usageError())).toBe(
      "Please provide the model file path as an argument.",
    );
  });

  it("renders every other kind with the error prefix", () => {
    expect(renderError(configurationError("No rules loaded"))).toBe(
      "An error occurred: No rules loaded",
    );
    expect(renderError(arithmeticError("Nothing to score"))).toBe(
      "An error occurred: Nothing to score",
    );
  });

  it("wraps unknown failures as collaborator errors", () => {
    const cause = new Error("Network unreachable");
    const wrapped = toLinterError(cause);
    expect(wrapped).toBeInstanceOf(LinterError);
    expect(wrapped.kind).toBe("collaborator");
    expect(wrapped.message).toBe("Network unreachable");
    expect(wrapped.cause).toBe(cause);

    expect(toLinterError("plain string").message).toBe("plain string");
  });

  it("keeps already classified errors", () => {
    const error = configurationError("bad source");
    expect(toLinterError(error)).toBe(error);
  });
});
