import { describe, test, expect } from "vitest";
import { classifyTypeSignature, formatTypeSignature, parseTypeSignature } from "../../lib/typeWrapper";
import { captureMaterializeError } from "../utils/testHelpers";

describe("classifyTypeSignature", () => {
  test.each([
    ["Door", "bare"],
    ["Door!", "nonNull"],
    ["[Door]", "list"],
    ["[Door!]", "listOfNonNull"],
    ["[Door]!", "nonNullList"],
    ["[Door!]!", "nonNullListOfNonNull"],
  ])("%s is classified as %s", (text, pattern) => {
    expect(classifyTypeSignature(parseTypeSignature(text))).toEqual({ pattern, baseTypeName: "Door" });
  });

  test("rejects nested lists and names the field", () => {
    const err = captureMaterializeError(() =>
      classifyTypeSignature(parseTypeSignature("[[Door]]"), "Cabin.doors"),
    );
    expect(err.code).toBe("UNSUPPORTED_SHAPE");
    expect(err.error.path).toBe("Cabin.doors");
    expect(err.message).toBe("Unsupported type signature '[[Door]]' on Cabin.doors");
  });

  test("rejects a repeated non-null modifier", () => {
    const err = captureMaterializeError(() =>
      classifyTypeSignature({ baseTypeName: "Door", modifiers: ["NON_NULL", "NON_NULL"] }),
    );
    expect(err.code).toBe("UNSUPPORTED_SHAPE");
    expect(err.error.details).toEqual({ signature: "Door!!" });
  });

  test("rejects an empty base type name", () => {
    const err = captureMaterializeError(() => classifyTypeSignature({ baseTypeName: "", modifiers: [] }));
    expect(err.code).toBe("UNSUPPORTED_SHAPE");
  });
});

describe("parseTypeSignature", () => {
  test("lists modifiers innermost first", () => {
    expect(parseTypeSignature("[Door!]!")).toEqual({
      baseTypeName: "Door",
      modifiers: ["NON_NULL", "LIST", "NON_NULL"],
    });
    expect(parseTypeSignature("[Door]!")).toEqual({ baseTypeName: "Door", modifiers: ["LIST", "NON_NULL"] });
  });

  test("ignores whitespace", () => {
    expect(parseTypeSignature(" [ Door ! ] ")).toEqual({ baseTypeName: "Door", modifiers: ["NON_NULL", "LIST"] });
  });

  test("parses nested lists so the classifier can reject them", () => {
    expect(parseTypeSignature("[[Door]]")).toEqual({ baseTypeName: "Door", modifiers: ["LIST", "LIST"] });
  });

  test.each(["[Door", "Door]", "", "[]", "Do-or"])("rejects malformed text %j", (text) => {
    expect(captureMaterializeError(() => parseTypeSignature(text)).code).toBe("UNSUPPORTED_SHAPE");
  });
});

describe("formatTypeSignature", () => {
  test.each(["Door", "Door!", "[Door]", "[Door!]", "[Door]!", "[Door!]!"])("renders %s back", (text) => {
    expect(formatTypeSignature(parseTypeSignature(text))).toBe(text);
  });
});
