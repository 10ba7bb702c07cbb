import { describe, expect, it } from "vitest";
import {
  compileMatchSpec,
  compileReplacer,
  groupCount,
  parseTemplate,
  renderTemplate,
} from "../pattern.js";
import { unwrap } from "./helpers.js";

describe("compileMatchSpec", () => {
  it("matches the whole filename only", () => {
    const spec = unwrap(compileMatchSpec("IMG\\d+", { caseInsensitive: false }));
    expect(spec.pattern.test("IMG12")).toBe(true);
    expect(spec.pattern.test("xIMG12")).toBe(false);
    expect(spec.pattern.test("IMG12.jpg")).toBe(false);
  });

  it("anchors every alternative", () => {
    const spec = unwrap(compileMatchSpec("a|b", { caseInsensitive: false }));
    expect(spec.pattern.test("a")).toBe(true);
    expect(spec.pattern.test("ab")).toBe(false);
  });

  it("honours the case-insensitive flag for both patterns", () => {
    const spec = unwrap(compileMatchSpec("case", { caseInsensitive: true, except: "E$" }));
    expect(spec.pattern.test("CaSe")).toBe(true);
    expect(spec.exclude?.test("case")).toBe(true);
  });

  it("compiles the except pattern unanchored", () => {
    const spec = unwrap(compileMatchSpec(".*", { caseInsensitive: false, except: "bak" }));
    expect(spec.exclude?.test("notes.bak.txt")).toBe(true);
  });

  it("reports a CompileError naming the bad pattern", () => {
    const result = compileMatchSpec("[invalid", { caseInsensitive: false });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("CompileError");
    expect(result.error.message).toMatch(/^Invalid regular expression `\[invalid`: /);
  });

  it("reports a CompileError for a bad except pattern", () => {
    const result = compileMatchSpec(".*", { caseInsensitive: false, except: "(" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Invalid regular expression `\(`: /);
  });

  it("counts capture groups", () => {
    expect(groupCount(unwrap(compileMatchSpec("(a)(b)?c", { caseInsensitive: false })))).toBe(2);
    expect(groupCount(unwrap(compileMatchSpec("(?:x)y", { caseInsensitive: false })))).toBe(0);
  });
});

describe("compileReplacer", () => {
  it("replaces every occurrence", () => {
    const replace = unwrap(compileReplacer("_", " ", false));
    expect(replace("a_b_c.txt")).toBe("a b c.txt");
  });

  it("matches case-insensitively when asked", () => {
    const replace = unwrap(compileReplacer("e", "ee", true));
    expect(replace("CasE1e")).toBe("Casee1ee");
  });

  it("takes both substrings literally", () => {
    const replace = unwrap(compileReplacer(".", "$&x", false));
    expect(replace("a.b")).toBe("a$&xb");
  });

  it("rejects an empty substring", () => {
    const result = compileReplacer("", "x", false);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("ConfigError");
  });
});

describe("parseTemplate", () => {
  it("splits literals, groups and the index placeholder", () => {
    const template = unwrap(parseTemplate("Photo \\(index) \\1.jpg"));
    expect(template.tokens).toEqual([
      { kind: "literal", text: "Photo " },
      { kind: "index" },
      { kind: "literal", text: " " },
      { kind: "group", index: 1 },
      { kind: "literal", text: ".jpg" },
    ]);
    expect(template.usesIndex).toBe(true);
  });

  it("reads bare group numbers greedily and bracketed ones exactly", () => {
    expect(unwrap(parseTemplate("\\12x")).tokens).toEqual([
      { kind: "group", index: 12 },
      { kind: "literal", text: "x" },
    ]);
    expect(unwrap(parseTemplate("\\(1)2")).tokens).toEqual([
      { kind: "group", index: 1 },
      { kind: "literal", text: "2" },
    ]);
  });

  it("accepts the index placeholder in any case", () => {
    expect(unwrap(parseTemplate("\\(INDEX)")).tokens).toEqual([{ kind: "index" }]);
  });

  it("keeps other backslashes literal", () => {
    const template = unwrap(parseTemplate("a\\b"));
    expect(template.tokens).toEqual([{ kind: "literal", text: "a\\b" }]);
    expect(template.usesIndex).toBe(false);
  });

  it("rejects group zero in either form", () => {
    for (const template of ["\\0.bak", "\\(0).bak"]) {
      const result = parseTemplate(template);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("TemplateError");
    }
    const bare = parseTemplate("\\0.bak");
    expect(!bare.ok && bare.error.message).toBe("Group references start at 1: `\\0`");
  });

  it("rejects unknown special references", () => {
    const result = parseTemplate("\\(invalid)");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("TemplateError");
    expect(result.error.message).toBe("Unknown special reference: `invalid`");
  });
});

describe("renderTemplate", () => {
  it("substitutes groups and the index value", () => {
    const template = unwrap(parseTemplate("\\2-\\1 (\\(index))"));
    expect(renderTemplate(template, ["a", "b"], "07")).toBe("b-a (07)");
  });

  it("renders a group with no text as empty", () => {
    const template = unwrap(parseTemplate("[\\1]"));
    expect(renderTemplate(template, [""], "")).toBe("[]");
  });
});
