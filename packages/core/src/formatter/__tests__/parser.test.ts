import { describe, expect, it } from "vitest";
import { parseTemplate } from "../parser.js";

function syntaxError(template: string): { kind: string; message: string; position?: number } {
  const result = parseTemplate(template);
  if (result.ok) throw new Error(`expected '${template}' to fail`);
  return {
    kind: result.error.kind,
    message: result.error.message,
    position: result.error.position,
  };
}

describe("parseTemplate", () => {
  it("keeps plain text as one literal", () => {
    const result = parseTemplate("hello world");
    expect(result.ok && result.value.tokens).toEqual([{ kind: "literal", text: "hello world" }]);
  });

  it("parses the default container format", () => {
    const result = parseTemplate("[$symbol \\[$name\\]]($style) ");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.source).toBe("[$symbol \\[$name\\]]($style) ");
    expect(result.value.tokens).toEqual([
      {
        kind: "style-group",
        children: [
          { kind: "variable", name: "symbol" },
          { kind: "literal", text: " [" },
          { kind: "variable", name: "name" },
          { kind: "literal", text: "]" },
        ],
        style: [{ kind: "variable", name: "style" }],
      },
      { kind: "literal", text: " " },
    ]);
  });

  it("parses braced variables", () => {
    const result = parseTemplate("${name}x");
    expect(result.ok && result.value.tokens).toEqual([
      { kind: "variable", name: "name" },
      { kind: "literal", text: "x" },
    ]);
  });

  it("ends a variable name at the first non-name character", () => {
    const result = parseTemplate("$name-suffix");
    expect(result.ok && result.value.tokens).toEqual([
      { kind: "variable", name: "name" },
      { kind: "literal", text: "-suffix" },
    ]);
  });

  it("unescapes special characters", () => {
    const result = parseTemplate("\\$5 \\(x\\) \\\\");
    expect(result.ok && result.value.tokens).toEqual([{ kind: "literal", text: "$5 (x) \\" }]);
  });

  it("parses conditional groups", () => {
    const result = parseTemplate("(via $name)");
    expect(result.ok && result.value.tokens).toEqual([
      {
        kind: "conditional",
        children: [
          { kind: "literal", text: "via " },
          { kind: "variable", name: "name" },
        ],
      },
    ]);
  });

  it("parses literal, reset and variable style words", () => {
    const result = parseTemplate("[x](bold $style none italic)");
    expect(result.ok && result.value.tokens).toEqual([
      {
        kind: "style-group",
        children: [{ kind: "literal", text: "x" }],
        style: [
          { kind: "literal", style: { bold: true } },
          { kind: "variable", name: "style" },
          { kind: "reset" },
          { kind: "literal", style: { italic: true } },
        ],
      },
    ]);
  });

  it("accepts braced style variables", () => {
    const result = parseTemplate("[x](${style})");
    expect(result.ok && result.value.tokens).toEqual([
      {
        kind: "style-group",
        children: [{ kind: "literal", text: "x" }],
        style: [{ kind: "variable", name: "style" }],
      },
    ]);
  });

  describe("syntax errors", () => {
    it("reports an unclosed text group", () => {
      expect(syntaxError("[abc")).toEqual({
        kind: "Syntax",
        message: "Missing closing ']' at position 4 in '[abc'",
        position: 4,
      });
    });

    it("reports an unexpected closing bracket", () => {
      expect(syntaxError("abc)").message).toBe("Unexpected ')' at position 3 in 'abc)'");
      expect(syntaxError("(a]b)").message).toBe("Unexpected ']' at position 2 in '(a]b)'");
    });

    it("reports a dollar sign without a name", () => {
      expect(syntaxError("$ x").message).toBe(
        "Expected a variable name after '$' at position 0 in '$ x'"
      );
    });

    it("reports an unterminated braced variable", () => {
      expect(syntaxError("${name").message).toBe(
        "Missing closing '}' in variable reference at position 0 in '${name'"
      );
    });

    it("requires a style after a text group", () => {
      expect(syntaxError("[x]bold").message).toBe(
        "Expected '(' with a style after text group at position 3 in '[x]bold'"
      );
      expect(syntaxError("[x](bold").message).toBe(
        "Missing closing ')' for style at position 0 in '[x](bold'"
      );
    });

    it("reports a trailing escape", () => {
      expect(syntaxError("tail\\").message).toBe(
        "Trailing escape character at position 4 in 'tail\\'"
      );
    });

    it("reports invalid style variables", () => {
      expect(syntaxError("[x]($)").kind).toBe("Syntax");
    });
  });

  it("reports malformed literal style words as invalid styles", () => {
    const error = syntaxError("[x](bold sparkly)");
    expect(error).toEqual({
      kind: "InvalidStyle",
      message: "Invalid style word 'sparkly' in 'sparkly'",
      position: 4,
    });
  });
});
