import { describe, it, expect } from "vitest";
import { classifyRole, compileRoleRules, tagBlock } from "../role-classifier";
import type { Block } from "../../core/schemas";

describe("classifyRole", () => {
  it("tags the Botox sentence as transactional via the $ trigger", () => {
    expect(classifyRole("Botox costs $300 per session and lasts 3-4 months.")).toEqual({
      role: "TRANSACTIONAL",
      matchedRule: "transactional:$",
      confidence: 0.62,
    });
  });

  it("applies rules in priority order", () => {
    const match = classifyRole("Book now to get a 20% discount on your first order.");
    expect(match.role).toBe("TRANSACTIONAL");
    expect(match.matchedRule).toBe("transactional:book now");
    expect(match.confidence).toBe(0.76);
  });

  it("reports the first keyword in list order", () => {
    expect(classifyRole("Our clinic is open Monday to Friday.")).toEqual({
      role: "TEMPORAL",
      matchedRule: "temporal:open",
      confidence: 0.68,
    });
  });

  it("matches keywords as case-insensitive substrings", () => {
    expect(classifyRole("The REORDER form")).toEqual({
      role: "TRANSACTIONAL",
      matchedRule: "transactional:order",
      confidence: 0.7,
    });
    expect(classifyRole("Our prices are listed below.").matchedRule).toBe("transactional:price");
  });

  it("matches contact patterns", () => {
    expect(classifyRole("Write to hello@example.com for details.").matchedRule).toBe(
      "contact:email"
    );
    expect(classifyRole("Ring us on (555) 123-4567.")).toEqual({
      role: "CONTACT",
      matchedRule: "contact:phone",
      confidence: 0.7,
    });
  });

  it("scales confidence with trigger length", () => {
    expect(classifyRole("Please get in touch with our team.")).toEqual({
      role: "CONTACT",
      matchedRule: "contact:get in touch",
      confidence: 0.84,
    });
    expect(classifyRole("The treatment smooths fine lines.")).toEqual({
      role: "DESCRIPTIVE",
      matchedRule: "descriptive:treatment",
      confidence: 0.78,
    });
  });

  it("falls back to GENERAL", () => {
    expect(classifyRole("Welcome to our little corner of the web.")).toEqual({
      role: "GENERAL",
      matchedRule: "none",
      confidence: 0.3,
    });
  });

  it("accepts custom rules", () => {
    const rules = compileRoleRules([
      { id: "gifts", role: "PROMOTIONAL", keywords: ["gift"], patterns: [] },
    ]);
    expect(classifyRole("Gift cards for every occasion", rules)).toEqual({
      role: "PROMOTIONAL",
      matchedRule: "gifts:gift",
      confidence: 0.68,
    });
  });

  it("is deterministic", () => {
    const text = "Apply a thin layer after cleansing.";
    expect(classifyRole(text)).toEqual(classifyRole(text));
  });
});

describe("tagBlock", () => {
  it("extends a block with role fields", () => {
    const block: Block = {
      source_url: "https://example.com/",
      page_type: "general",
      ordinal: 3,
      text: "Botox costs $300 per session and lasts 3-4 months.",
      flags: { price: true, measurement: false, temporal: true, warning: false },
      char_count: 50,
      word_count: 9,
    };

    expect(tagBlock(block)).toEqual({
      ...block,
      role: "TRANSACTIONAL",
      matched_rule: "transactional:$",
      confidence: 0.62,
    });
  });
});
