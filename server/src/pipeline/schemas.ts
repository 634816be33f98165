import { z } from "zod";

export const STAGE_ORDER = ["taxonomy", "segment", "behavioral", "competitive", "jury"] as const;

export type StageRole = (typeof STAGE_ORDER)[number];

export const StageRoleSchema = z.enum(STAGE_ORDER);

/** Stages that run one call per category or segment. Only their drops count against coverage. */
export const FAN_OUT_STAGES: ReadonlySet<StageRole> = new Set<StageRole>(["segment", "behavioral", "competitive"]);

// Models sometimes answer a prose field with an object or a list; flatten those into text.
export function coerceText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value.trim();
  if (Array.isArray(value)) return value.map((v) => coerceText(v)).join("; ");
  if (typeof value === "object") {
    return Object.entries(value)
      .map(([k, v]) => `${k}: ${coerceText(v)}`)
      .join(" | ");
  }
  return String(value);
}

const looseText = z.preprocess(coerceText, z.string());
const requiredText = z.preprocess(coerceText, z.string().min(1));
const textList = z.array(z.string().min(1)).default([]);

export const TaxonomyCategorySchema = z.object({
  name: z.string().min(1),
  description: looseText.default(""),
  tam: looseText.default(""),
  som: looseText.default(""),
  historical_cagr: looseText.default(""),
  projected_cagr: looseText.default(""),
  trends: textList
});

export const TaxonomyOutputSchema = z.object({
  industry: looseText.default(""),
  summary: looseText.default(""),
  categories: z.array(TaxonomyCategorySchema).min(1)
});

export const SegmentProfileSchema = z.object({
  name: z.string().min(1),
  segment_type: z.enum(["primary", "secondary"]).default("primary"),
  description: looseText.default(""),
  growth_drivers: textList,
  under_capitalized: z.boolean().default(false),
  over_saturated: z.boolean().default(false),
  notes: looseText.default("")
});

export const SegmentOutputSchema = z.object({
  category_name: looseText.default(""),
  segments: z.array(SegmentProfileSchema).min(1)
});

export const BehavioralOutputSchema = z.object({
  zero_moment_of_truth: requiredText,
  alternative_paths: textList,
  retention_killers: textList,
  notes: looseText.default("")
});

export const CompetitiveOutputSchema = z.object({
  delivery_mechanisms: textList,
  product_feature_gaps: textList,
  experience_gaps: textList,
  moat_assessment: requiredText,
  notes: looseText.default("")
});

export const SegmentVerdictSchema = z.object({
  segment_id: z.string().min(1),
  verdict: z.enum(["green", "amber", "red"]),
  rationale: looseText.default("")
});

export const AllocationProposalSchema = z.object({
  segment_id: z.string().min(1),
  amount_usd: z.number().finite().nonnegative(),
  rationale: looseText.default("")
});

export const JuryOutputSchema = z.object({
  conflict_check: requiredText,
  moat_assessment: looseText.default(""),
  executive_summary: requiredText,
  resource_allocation: z.object({
    rationale: looseText.default(""),
    allocations: z.array(AllocationProposalSchema).default([])
  }),
  segment_verdicts: z.array(SegmentVerdictSchema).default([])
});

export type TaxonomyCategory = z.infer<typeof TaxonomyCategorySchema>;
export type TaxonomyOutput = z.infer<typeof TaxonomyOutputSchema>;
export type SegmentProfile = z.infer<typeof SegmentProfileSchema>;
export type SegmentOutput = z.infer<typeof SegmentOutputSchema>;
export type BehavioralOutput = z.infer<typeof BehavioralOutputSchema>;
export type CompetitiveOutput = z.infer<typeof CompetitiveOutputSchema>;
export type SegmentVerdict = z.infer<typeof SegmentVerdictSchema>;
export type AllocationProposal = z.infer<typeof AllocationProposalSchema>;
export type JuryOutput = z.infer<typeof JuryOutputSchema>;
