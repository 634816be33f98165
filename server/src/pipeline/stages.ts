import type { z } from "zod";
import type { CategoryNode, ResearchArtifact, SegmentNode } from "./artifact.js";
import { STAGE_AGENT_NAMES } from "./backend.js";
import {
  BehavioralOutputSchema,
  CompetitiveOutputSchema,
  JuryOutputSchema,
  SegmentOutputSchema,
  TaxonomyOutputSchema,
  type BehavioralOutput,
  type CompetitiveOutput,
  type JuryOutput,
  type SegmentOutput,
  type StageRole,
  type TaxonomyOutput
} from "./schemas.js";

export type TaxonomyItem = { id: string; industry: string };
export type SegmentItem = { id: string; category: Omit<CategoryNode, "segments"> };
export type BehavioralItem = { id: string; segment: Omit<SegmentNode, "behavior" | "competition"> };
export type CompetitiveItem = { id: string; categoryName: string; segmentName: string; behavior: BehavioralOutput };
export type JuryItem = { id: string; artifact: ResearchArtifact; budgetUsd: number };

export type StageItems = {
  taxonomy: TaxonomyItem;
  segment: SegmentItem;
  behavioral: BehavioralItem;
  competitive: CompetitiveItem;
  jury: JuryItem;
};

export type StageOutputs = {
  taxonomy: TaxonomyOutput;
  segment: SegmentOutput;
  behavioral: BehavioralOutput;
  competitive: CompetitiveOutput;
  jury: JuryOutput;
};

/** Everything one call may see: its own upstream item and the run digest. Nothing from sibling branches. */
export type StageContext<TItem> = {
  readonly item: TItem;
  readonly summary: string;
};

export type StageDefinition<R extends StageRole> = {
  role: R;
  agentName: string;
  schema: z.ZodType<StageOutputs[R], z.ZodTypeDef, unknown>;
  instructions: string;
  buildPrompt: (context: StageContext<StageItems[R]>) => string;
  describeItem: (item: StageItems[R]) => string;
};

export function buildStageContext<TItem>(item: TItem, summary: string): StageContext<TItem> {
  return Object.freeze({ item: structuredClone(item), summary });
}

function bullets(items: readonly string[], empty = "None specified."): string {
  if (items.length === 0) return empty;
  return items.map((item) => `- ${item}`).join("\n");
}

const taxonomy: StageDefinition<"taxonomy"> = {
  role: "taxonomy",
  agentName: STAGE_AGENT_NAMES.taxonomy,
  schema: TaxonomyOutputSchema,
  instructions: `You are the Taxonomy Architect.

You decompose an industry into its core technical or service categories and size each one.

Rules:
- List 3 to 7 categories.
- For each category give TAM and SOM as short text (e.g. "$50B / $5B"), historical and projected CAGR for 2024-2030 as percentages, and the core trends.
- The summary is 2 to 3 sentences covering the industry and its key metrics.
- Return ONLY valid JSON, no markdown fences.
- Output shape: {"industry": "...", "summary": "...", "categories": [{"name": "...", "description": "...", "tam": "...", "som": "...", "historical_cagr": "...", "projected_cagr": "...", "trends": ["..."]}]}`,
  buildPrompt: ({ item }) => `INDUSTRY:\n${item.industry.trim()}\n\nDecompose this industry into categories with market metrics and trends.`,
  describeItem: (item) => item.industry
};

const segment: StageDefinition<"segment"> = {
  role: "segment",
  agentName: STAGE_AGENT_NAMES.segment,
  schema: SegmentOutputSchema,
  instructions: `You are the Segment Specialist.

You drill into one market category to find its niche segments, their growth drivers and how crowded they are.

Rules:
- List 2 to 5 segments, each labelled "primary" or "secondary".
- Name concrete growth drivers (regulatory shifts, technology breakthroughs, demand changes).
- Flag each segment as under_capitalized and/or over_saturated (booleans).
- Return ONLY valid JSON, no markdown fences.
- Output shape: {"category_name": "...", "segments": [{"name": "...", "segment_type": "primary", "description": "...", "growth_drivers": ["..."], "under_capitalized": false, "over_saturated": false, "notes": "..."}]}`,
  buildPrompt: ({ item, summary }) => {
    const c = item.category;
    return (
      `RUN SUMMARY:\n${summary}\n\n` +
      `CATEGORY: ${c.name}\n` +
      `Description: ${c.description || "No additional context."}\n` +
      `TAM / SOM: ${c.tam || "n/a"} / ${c.som || "n/a"}\n` +
      `CAGR (historical -> projected): ${c.historical_cagr || "n/a"} -> ${c.projected_cagr || "n/a"}\n` +
      `Trends:\n${bullets(c.trends)}`
    );
  },
  describeItem: (item) => item.category.name
};

const behavioral: StageDefinition<"behavioral"> = {
  role: "behavioral",
  agentName: STAGE_AGENT_NAMES.behavioral,
  schema: BehavioralOutputSchema,
  instructions: `You are the Behavioral Ethologist.

You map the human side of one market segment: when users notice their problem, how they cope, and why they abandon solutions.

Rules:
- zero_moment_of_truth describes the trigger moment when the user realizes the current process is broken.
- alternative_paths lists free or manual workarounds used before paying for a solution.
- retention_killers lists why users quit existing solutions.
- Return ONLY valid JSON, no markdown fences.
- Output shape: {"zero_moment_of_truth": "...", "alternative_paths": ["..."], "retention_killers": ["..."], "notes": "..."}`,
  buildPrompt: ({ item, summary }) => {
    const s = item.segment;
    return (
      `RUN SUMMARY:\n${summary}\n\n` +
      `CATEGORY: ${s.categoryName}\n` +
      `SEGMENT: ${s.name} (${s.segment_type})\n` +
      `Segment context: ${s.description || s.notes || "No additional context."}\n` +
      `Growth drivers:\n${bullets(s.growth_drivers)}`
    );
  },
  describeItem: (item) => `${item.segment.categoryName} / ${item.segment.name}`
};

const competitive: StageDefinition<"competitive"> = {
  role: "competitive",
  agentName: STAGE_AGENT_NAMES.competitive,
  schema: CompetitiveOutputSchema,
  instructions: `You are the Competitive Strategist.

You map how the market answers one segment's user pains: delivery mechanisms, product and experience gaps, and incumbent moats.

Rules:
- delivery_mechanisms lists every way the solution is delivered today (API, managed service, mobile app, SaaS, ...).
- Separate product_feature_gaps from experience_gaps.
- moat_assessment is one paragraph on whether incumbents are protected by brand, network effects or switching costs.
- Return ONLY valid JSON, no markdown fences.
- Output shape: {"delivery_mechanisms": ["..."], "product_feature_gaps": ["..."], "experience_gaps": ["..."], "moat_assessment": "...", "notes": "..."}`,
  buildPrompt: ({ item, summary }) =>
    `RUN SUMMARY:\n${summary}\n\n` +
    `CATEGORY: ${item.categoryName}\n` +
    `SEGMENT: ${item.segmentName}\n\n` +
    `USER PAIN POINTS:\n` +
    `Zero moment of truth: ${item.behavior.zero_moment_of_truth}\n` +
    `Alternative paths:\n${bullets(item.behavior.alternative_paths)}\n` +
    `Retention killers:\n${bullets(item.behavior.retention_killers)}`,
  describeItem: (item) => `${item.categoryName} / ${item.segmentName}`
};

function juryDigest(artifact: ResearchArtifact): unknown {
  return {
    industry: artifact.industry,
    summary: artifact.summary,
    categories: artifact.categories.map((c) => ({
      name: c.name,
      tam: c.tam,
      som: c.som,
      historical_cagr: c.historical_cagr,
      projected_cagr: c.projected_cagr,
      trends: c.trends,
      segments: c.segments
        .filter((s) => s.behavior !== null && s.competition !== null)
        .map((s) => ({
          segment_id: s.id,
          name: s.name,
          segment_type: s.segment_type,
          under_capitalized: s.under_capitalized,
          over_saturated: s.over_saturated,
          growth_drivers: s.growth_drivers,
          pain_points: s.behavior,
          competition: s.competition
        }))
    }))
  };
}

const jury: StageDefinition<"jury"> = {
  role: "jury",
  agentName: STAGE_AGENT_NAMES.jury,
  schema: JuryOutputSchema,
  instructions: `You are the Decision Jury.

You stress-test a consolidated market research artifact and decide where capital should go.

Rules:
- conflict_check: does the category CAGR agree with the user friction reported for its segments? Strong growth plus unhappy users is a green flag for a new entrant.
- moat_assessment: can a new solution survive the competition described, and is the delivery mechanism too expensive to acquire users?
- resource_allocation: split the stated budget across segments by segment_id, favouring the shortest time to revenue. Amounts are in USD.
- segment_verdicts: one verdict per segment_id, "green" (strong opportunity), "amber" (moderate) or "red" (avoid).
- Only use segment_id values that appear in the artifact.
- Return ONLY valid JSON, no markdown fences. Escape quotes inside strings; no trailing commas.
- Output shape: {"conflict_check": "...", "moat_assessment": "...", "executive_summary": "...", "resource_allocation": {"rationale": "...", "allocations": [{"segment_id": "c1.s1", "amount_usd": 400000, "rationale": "..."}]}, "segment_verdicts": [{"segment_id": "c1.s1", "verdict": "green", "rationale": "..."}]}`,
  buildPrompt: ({ item, summary }) =>
    `RUN SUMMARY:\n${summary}\n\n` +
    `BUDGET (USD): ${item.budgetUsd}\n\n` +
    `ARTIFACT (json):\n${JSON.stringify(juryDigest(item.artifact), null, 2)}`,
  describeItem: (item) => `verdict for ${item.artifact.industry}`
};

export const STAGE_DEFINITIONS: { [R in StageRole]: StageDefinition<R> } = {
  taxonomy,
  segment,
  behavioral,
  competitive,
  jury
};
