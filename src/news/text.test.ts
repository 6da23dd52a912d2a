import { describe, expect, it } from "vitest";
import { cleanBodyText, pickBodyText } from "./text";
import { toKeywordQuery } from "./keywords";

describe("cleanBodyText", () => {
  it("strips markup and the truncation marker", () => {
    expect(cleanBodyText("<p>Hello&nbsp;<b>world</b></p> [+1234 chars]")).toBe("Hello world");
  });

  it("decodes entities", () => {
    expect(cleanBodyText("Army &amp; Navy")).toBe("Army & Navy");
  });

  it("collapses whitespace", () => {
    expect(cleanBodyText("  multiple\n\n  spaces ")).toBe("multiple spaces");
  });
});

describe("pickBodyText", () => {
  it("prefers content over description", () => {
    expect(pickBodyText("content text", "description text")).toBe("content text");
  });

  it("falls back to description when content is empty", () => {
    expect(pickBodyText(null, "description text")).toBe("description text");
    expect(pickBodyText("", "description text")).toBe("description text");
    expect(pickBodyText("<br>", "description text")).toBe("description text");
  });

  it("returns an empty string when nothing is usable", () => {
    expect(pickBodyText(undefined, null)).toBe("");
  });
});

describe("toKeywordQuery", () => {
  it("quotes multi-word terms and joins with OR", () => {
    expect(toKeywordQuery(["DRDO", " Indian Navy ", "", "ISRO"])).toBe('DRDO OR "Indian Navy" OR ISRO');
  });
});
