import { describe, expect, it } from "vitest";
import { BehavioralOutputSchema, coerceText, JuryOutputSchema, SegmentOutputSchema, TaxonomyOutputSchema } from "../src/pipeline/schemas.js";

describe("coerceText", () => {
  it("flattens structured prose into text", () => {
    expect(coerceText(null)).toBe("");
    expect(coerceText("  padded ")).toBe("padded");
    expect(coerceText(["a", "b"])).toBe("a; b");
    expect(coerceText({ tam: "$5B", som: 2 })).toBe("tam: $5B | som: 2");
  });
});

describe("stage schemas", () => {
  it("fills defaults for optional fields", () => {
    const out = SegmentOutputSchema.parse({ segments: [{ name: "SMB payments" }] });
    expect(out.segments[0]).toEqual({
      name: "SMB payments",
      segment_type: "primary",
      description: "",
      growth_drivers: [],
      under_capitalized: false,
      over_saturated: false,
      notes: ""
    });
  });

  it("accepts an object where a text field is expected", () => {
    const out = TaxonomyOutputSchema.parse({ categories: [{ name: "Payments", tam: { value: "$10B", year: 2024 } }] });
    expect(out.categories[0]?.tam).toBe("value: $10B | year: 2024");
  });

  it("rejects empty required content", () => {
    expect(TaxonomyOutputSchema.safeParse({ categories: [] }).success).toBe(false);
    expect(BehavioralOutputSchema.safeParse({ zero_moment_of_truth: "  " }).success).toBe(false);
    expect(
      JuryOutputSchema.safeParse({
        conflict_check: "ok",
        executive_summary: "ok",
        resource_allocation: {},
        segment_verdicts: [{ segment_id: "c1.s1", verdict: "maybe" }]
      }).success
    ).toBe(false);
  });
});
