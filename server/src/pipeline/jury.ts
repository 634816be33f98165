import { allSegments, survivingSegments, type ResearchArtifact, type SegmentNode } from "./artifact.js";
import type { AllocationProposal, JuryOutput, SegmentVerdict } from "./schemas.js";

export const DEFAULT_BUDGET_USD = 1_000_000;

const MAX_WEIGHT = 1e12;

export type AllocationLine = {
  segmentId: string;
  categoryName: string;
  segmentName: string;
  amountUsd: number;
  rationale: string;
};

export type ResourceAllocation = {
  budgetUsd: number;
  totalUsd: number;
  rationale: string;
  lines: AllocationLine[];
  /** True when the model's proposal had to be rescaled or filtered to fit the surviving segments. */
  adjusted: boolean;
  ignoredSegmentIds: string[];
};

export type VerdictLine = {
  segmentId: string;
  categoryName: string;
  segmentName: string;
  verdict: SegmentVerdict["verdict"];
  rationale: string;
};

export type ConsistencyCheck = {
  ok: boolean;
  issues: string[];
};

export type JuryVerdict = {
  conflictCheck: string;
  moatAssessment: string;
  executiveSummary: string;
  allocation: ResourceAllocation;
  verdicts: VerdictLine[];
  consistency: ConsistencyCheck;
};

function segmentLabel(segment: SegmentNode): string {
  return `${segment.categoryName} / ${segment.name}`;
}

function uniq(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Splits `budgetUsd` (whole dollars) across the surviving segments in proportion to the proposal.
 * Proposals naming other segments, or with a non-finite amount, are ignored; a proposal with no usable weight
 * is split evenly.
 * Rounding uses largest remainder, so the lines always sum to the budget exactly.
 */
export function allocateBudget(
  proposals: readonly AllocationProposal[],
  survivors: readonly SegmentNode[],
  budgetUsd: number
): ResourceAllocation {
  const budget = Math.max(0, Math.round(budgetUsd));
  const survivorIds = new Set(survivors.map((s) => s.id));
  const ignoredSegmentIds = uniq(proposals.filter((p) => !survivorIds.has(p.segment_id)).map((p) => p.segment_id));

  if (survivors.length === 0) {
    return { budgetUsd: budget, totalUsd: 0, rationale: "", lines: [], adjusted: proposals.length > 0, ignoredSegmentIds };
  }

  const usable = proposals.filter((p) => survivorIds.has(p.segment_id) && Number.isFinite(p.amount_usd) && p.amount_usd > 0);
  const proposed = survivors.map((s) => usable.filter((p) => p.segment_id === s.id).reduce((sum, p) => sum + p.amount_usd, 0));
  // Huge proposals are scaled down by a power of two (exact in floating point) so the sums below stay finite.
  const peak = usable.reduce((max, p) => Math.max(max, p.amount_usd), 0);
  const scale = peak > MAX_WEIGHT ? 2 ** Math.ceil(Math.log2(peak / MAX_WEIGHT)) : 1;
  const weights = survivors.map((s) =>
    usable.filter((p) => p.segment_id === s.id).reduce((sum, p) => sum + p.amount_usd / scale, 0)
  );
  const totalWeight = weights.reduce((sum, w) => sum + w, 0);
  const effective = totalWeight > 0 ? weights : weights.map(() => 1);
  const effectiveTotal = totalWeight > 0 ? totalWeight : survivors.length;

  const exact = effective.map((w) => (budget * w) / effectiveTotal);
  const amounts = exact.map((x) => Math.floor(x));
  const remainder = budget - amounts.reduce((sum, a) => sum + a, 0);
  const order = exact
    .map((x, index) => ({ index, frac: x - Math.floor(x) }))
    .sort((a, b) => b.frac - a.frac || a.index - b.index);
  for (let k = 0; k < remainder; k++) {
    const slot = order[k % order.length];
    if (slot) amounts[slot.index] = (amounts[slot.index] ?? 0) + 1;
  }

  const lines: AllocationLine[] = survivors.map((s, i) => ({
    segmentId: s.id,
    categoryName: s.categoryName,
    segmentName: s.name,
    amountUsd: amounts[i] ?? 0,
    rationale: proposals.find((p) => p.segment_id === s.id)?.rationale ?? ""
  }));

  const adjusted =
    ignoredSegmentIds.length > 0 ||
    totalWeight <= 0 ||
    lines.some((line, i) => Math.abs(line.amountUsd - (proposed[i] ?? 0)) >= 1);

  return {
    budgetUsd: budget,
    totalUsd: lines.reduce((sum, l) => sum + l.amountUsd, 0),
    rationale: "",
    lines,
    adjusted,
    ignoredSegmentIds
  };
}

export function checkJuryConsistency(
  artifact: ResearchArtifact,
  verdicts: readonly SegmentVerdict[],
  allocation: ResourceAllocation
): ConsistencyCheck {
  const issues: string[] = [];
  const known = new Map(allSegments(artifact).map((s) => [s.id, s]));
  const survivors = survivingSegments(artifact);
  const survivorIds = new Set(survivors.map((s) => s.id));
  const verdictById = new Map<string, SegmentVerdict>();

  for (const v of verdicts) {
    const segment = known.get(v.segment_id);
    if (!segment) {
      issues.push(`Verdict references unknown segment ${v.segment_id}`);
      continue;
    }
    if (!survivorIds.has(v.segment_id)) {
      issues.push(`Verdict for ${segmentLabel(segment)} covers a segment that was dropped before competitive analysis`);
    }
    if (!verdictById.has(v.segment_id)) verdictById.set(v.segment_id, v);
  }

  for (const s of survivors) {
    const verdict = verdictById.get(s.id);
    if (!verdict) {
      issues.push(`No verdict for ${segmentLabel(s)}`);
      continue;
    }
    if (verdict.verdict === "green" && s.over_saturated) {
      issues.push(`${segmentLabel(s)} is rated green but the segment analysis reported it over-saturated`);
    }
  }

  for (const line of allocation.lines) {
    if (line.amountUsd > 0 && verdictById.get(line.segmentId)?.verdict === "red") {
      issues.push(`${line.categoryName} / ${line.segmentName} receives $${line.amountUsd} despite a red verdict`);
    }
  }

  for (const id of allocation.ignoredSegmentIds) {
    issues.push(`Allocation proposal for unknown or dropped segment ${id} was ignored`);
  }

  return { ok: issues.length === 0, issues };
}

export function buildJuryVerdict(output: JuryOutput, artifact: ResearchArtifact, budgetUsd = DEFAULT_BUDGET_USD): JuryVerdict {
  const survivors = survivingSegments(artifact);
  const allocation = {
    ...allocateBudget(output.resource_allocation.allocations, survivors, budgetUsd),
    rationale: output.resource_allocation.rationale
  };
  const known = new Map(allSegments(artifact).map((s) => [s.id, s]));

  const verdicts: VerdictLine[] = [];
  for (const v of output.segment_verdicts) {
    const segment = known.get(v.segment_id);
    if (!segment || verdicts.some((line) => line.segmentId === v.segment_id)) continue;
    verdicts.push({
      segmentId: segment.id,
      categoryName: segment.categoryName,
      segmentName: segment.name,
      verdict: v.verdict,
      rationale: v.rationale
    });
  }

  return {
    conflictCheck: output.conflict_check,
    moatAssessment: output.moat_assessment,
    executiveSummary: output.executive_summary,
    allocation,
    verdicts,
    consistency: checkJuryConsistency(artifact, output.segment_verdicts, allocation)
  };
}
