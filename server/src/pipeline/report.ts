import type { RunOutcome } from "../executor.js";
import type { RunFailure } from "../run_manager.js";
import { allSegments, type ResearchArtifact } from "./artifact.js";
import { STAGE_AGENT_NAMES } from "./backend.js";
import { STAGE_ORDER } from "./schemas.js";

const FAILURE_LABELS = {
  fatal: "aborted by a non-retryable backend error",
  stage_failed: "stopped because a stage produced no usable output",
  cancelled: "cancelled",
  internal: "stopped by an internal error"
} as const;

export function formatUsd(amount: number): string {
  return `$${String(Math.round(amount)).replace(/\B(?=(\d{3})+(?!\d))/g, ",")}`;
}

function cell(text: string): string {
  const t = text.replace(/\s*\n\s*/g, " ").replace(/\|/g, "\\|").trim();
  return t.length > 0 ? t : "n/a";
}

function list(items: readonly string[]): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : ["- n/a"];
}

function or(text: string, fallback = "n/a"): string {
  return text.trim().length > 0 ? text.trim() : fallback;
}

function coverageLines(artifact: ResearchArtifact): string[] {
  const { coverage, dropped } = artifact;
  const out: string[] = [];
  if (coverage.partial) {
    out.push(
      `> **Partial coverage.** ${coverage.droppedCount} item(s) could not be analysed and are missing from this report.`,
      "",
      "| Stage | Item | Reason | Attempts |",
      "|---|---|---|---|",
      ...dropped.map((d) => `| ${d.stage} | ${cell(d.label)} | ${d.kind}: ${cell(d.message)} | ${d.attempts} |`),
      ""
    );
  }
  if (coverage.truncatedCategories > 0 || coverage.truncatedSegments > 0) {
    out.push(
      `> Fan-out caps left out ${coverage.truncatedCategories} categor${coverage.truncatedCategories === 1 ? "y" : "ies"} ` +
        `and ${coverage.truncatedSegments} segment(s).`,
      ""
    );
  }
  return out;
}

function executiveSummary(artifact: ResearchArtifact): string[] {
  const { categories, jury } = artifact;
  const parts = [`This report analyses the **${artifact.industry}** market.`];
  if (categories.length > 0) {
    parts.push(`It is decomposed into ${categories.length} categories: ${categories.map((c) => c.name).join(", ")}.`);
  }
  if (artifact.summary.trim()) parts.push(artifact.summary.trim());
  const out = [parts.join(" "), ""];
  if (jury) {
    out.push(`**Key verdict:** ${or(jury.executiveSummary)}`, "");
    const top = jury.verdicts.find((v) => v.verdict === "green");
    if (top) out.push(`Top recommended segment: **${top.categoryName} / ${top.segmentName}**.`, "");
  } else {
    out.push("No jury verdict was produced for this run.", "");
  }
  return out;
}

/** Renders a frozen artifact as the markdown report served for a finished run. */
export function renderReport(artifact: ResearchArtifact, outcome: { status: RunOutcome["status"]; failure?: RunFailure }): string {
  const lines: string[] = [];
  const segments = allSegments(artifact);

  lines.push(`# Market Research Report: ${artifact.industry}`, "");
  lines.push(`Generated: ${artifact.frozenAt ?? artifact.createdAt}`, "");

  if (outcome.failure) {
    const f = outcome.failure;
    const where = f.stage ? ` during the ${f.stage} stage` : "";
    lines.push(`> **Run ${FAILURE_LABELS[f.reason]}**${where}: ${f.message}`, "");
  }
  lines.push(...coverageLines(artifact));

  lines.push("## Methodology", "");
  lines.push("This report was produced by a sequential multi-agent pipeline:", "");
  STAGE_ORDER.forEach((stage, i) => lines.push(`${i + 1}. ${STAGE_AGENT_NAMES[stage]}`));
  lines.push("", "Every agent response was validated against a schema before it was accepted.", "");

  lines.push("## Executive Summary", "", ...executiveSummary(artifact));

  lines.push("## 1. Categories, Market Size and Trends", "");
  if (artifact.categories.length === 0) {
    lines.push("No category data.", "");
  } else {
    lines.push("| Category | TAM | SOM | Hist. CAGR | Proj. CAGR | Trends |", "|---|---|---|---|---|---|");
    for (const c of artifact.categories) {
      lines.push(
        `| ${cell(c.name)} | ${cell(c.tam)} | ${cell(c.som)} | ${cell(c.historical_cagr)} | ${cell(c.projected_cagr)} | ` +
          `${cell(c.trends.join("; "))} |`
      );
    }
    lines.push("");
  }

  lines.push("## 2. Segmented Decomposition", "");
  for (const c of artifact.categories) {
    lines.push(`### ${c.name}`, "");
    if (c.segments.length === 0) {
      lines.push("No segments.", "");
      continue;
    }
    for (const s of c.segments) {
      const flags = [s.under_capitalized ? "under-capitalized" : "", s.over_saturated ? "over-saturated" : ""].filter(Boolean);
      lines.push(`- **${s.name}** (${s.segment_type}${flags.length > 0 ? `, ${flags.join(", ")}` : ""})`);
      for (const d of s.growth_drivers) lines.push(`  - ${d}`);
    }
    lines.push("");
  }

  lines.push("## 3. User Pain Points and Friction", "");
  for (const s of segments) {
    if (!s.behavior) continue;
    lines.push(`### ${s.categoryName} / ${s.name}`, "");
    lines.push(`**Zero moment of truth:** ${or(s.behavior.zero_moment_of_truth)}`, "");
    lines.push("**Alternative paths:**", ...list(s.behavior.alternative_paths), "");
    lines.push("**Retention killers:**", ...list(s.behavior.retention_killers), "");
  }

  lines.push("## 4. Competition, Delivery and Gaps", "");
  for (const s of segments) {
    if (!s.competition) continue;
    lines.push(`### ${s.categoryName} / ${s.name}`, "");
    lines.push(`**Delivery:** ${or(s.competition.delivery_mechanisms.join(", "))}`, "");
    lines.push("**Product gaps:**", ...list(s.competition.product_feature_gaps), "");
    lines.push("**Experience gaps:**", ...list(s.competition.experience_gaps), "");
    lines.push(`**Moat:** ${or(s.competition.moat_assessment)}`, "");
  }

  lines.push("## 5. Decision Jury", "");
  const jury = artifact.jury;
  if (!jury) {
    lines.push("The jury did not run.");
    return lines.join("\n");
  }
  lines.push("### Conflict Check", "", or(jury.conflictCheck), "");
  lines.push("### Moat Assessment", "", or(jury.moatAssessment), "");
  lines.push(`### Resource Allocation (${formatUsd(jury.allocation.budgetUsd)})`, "");
  if (jury.allocation.rationale.trim()) lines.push(jury.allocation.rationale.trim(), "");
  lines.push("| Segment | Amount | Rationale |", "|---|---|---|");
  for (const line of jury.allocation.lines) {
    lines.push(`| ${cell(`${line.categoryName} / ${line.segmentName}`)} | ${formatUsd(line.amountUsd)} | ${cell(line.rationale)} |`);
  }
  lines.push(`| **Total** | **${formatUsd(jury.allocation.totalUsd)}** | |`, "");
  if (jury.allocation.adjusted) lines.push("_The proposed split was normalised to the surviving segments and the budget._", "");

  lines.push("### Segment Verdicts", "");
  for (const v of jury.verdicts) {
    lines.push(`- ${v.categoryName} / ${v.segmentName}: **${v.verdict}**. ${v.rationale}`.trimEnd());
  }
  lines.push("");

  if (jury.consistency.issues.length > 0) {
    lines.push("### Consistency Notes", "", ...jury.consistency.issues.map((issue) => `- ${issue}`));
  }
  return lines.join("\n");
}
