import {
  BehavioralOutputSchema,
  CompetitiveOutputSchema,
  SegmentProfileSchema,
  TaxonomyOutputSchema,
  type BehavioralOutput,
  type CompetitiveOutput,
  type SegmentProfile,
  type TaxonomyOutput
} from "../src/pipeline/schemas.js";

export function taxonomyOutput(industry: string, categoryNames: string[]): TaxonomyOutput {
  return TaxonomyOutputSchema.parse({
    industry,
    summary: `${industry} summary.`,
    categories: categoryNames.map((name) => ({ name, tam: "$10B", som: "$1B", trends: [`${name} trend`] }))
  });
}

export function segmentProfile(name: string, overrides: Record<string, unknown> = {}): SegmentProfile {
  return SegmentProfileSchema.parse({ name, growth_drivers: ["Demand"], ...overrides });
}

export function behavior(zmot = "Month-end close slips"): BehavioralOutput {
  return BehavioralOutputSchema.parse({
    zero_moment_of_truth: zmot,
    alternative_paths: ["Spreadsheets"],
    retention_killers: ["Slow onboarding"]
  });
}

export function competition(moat = "Switching costs"): CompetitiveOutput {
  return CompetitiveOutputSchema.parse({
    delivery_mechanisms: ["SaaS"],
    product_feature_gaps: ["No API"],
    experience_gaps: ["Email support only"],
    moat_assessment: moat
  });
}
