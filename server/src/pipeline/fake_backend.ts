import type { GenerateRequest, GenerativeBackend } from "./backend.js";
import { abortableSleep } from "./structured_client.js";

function parseDelayMs(): number {
  const raw = Number(process.env.ATLAS_FAKE_CALL_DELAY_MS ?? 40);
  if (!Number.isFinite(raw) || raw < 0) return 40;
  return Math.min(2000, raw);
}

function lineAfter(prompt: string, label: string): string {
  const match = new RegExp(`^${label}:\\s*(.*)$`, "m").exec(prompt);
  return match?.[1]?.trim() ?? "";
}

function segmentName(prompt: string): string {
  return lineAfter(prompt, "SEGMENT").replace(/\s*\((primary|secondary)\)$/, "");
}

function taxonomy(prompt: string): unknown {
  const industry = /INDUSTRY:\n(.+)/.exec(prompt)?.[1]?.trim() || "Unknown industry";
  const categories = ["Infrastructure", "Services", "Analytics"].map((suffix, i) => ({
    name: `${industry} ${suffix}`,
    description: `Offline placeholder for the ${suffix.toLowerCase()} layer of ${industry}.`,
    tam: `$${(i + 2) * 10}B`,
    som: `$${i + 1}B`,
    historical_cagr: `${8 + i}%`,
    projected_cagr: `${12 + i}%`,
    trends: [`${suffix} consolidation`, "Automation"]
  }));
  return { industry, summary: `${industry} decomposed offline into ${categories.length} categories.`, categories };
}

function segments(prompt: string): unknown {
  const category = lineAfter(prompt, "CATEGORY") || "Category";
  return {
    category_name: category,
    segments: [
      {
        name: `${category} for SMBs`,
        segment_type: "primary",
        description: "Small teams without in-house specialists.",
        growth_drivers: ["Cheaper tooling", "Regulatory pressure"],
        under_capitalized: true,
        over_saturated: false
      },
      {
        name: `${category} for Enterprises`,
        segment_type: "secondary",
        description: "Large buyers with procurement cycles.",
        growth_drivers: ["Vendor consolidation"],
        under_capitalized: false,
        over_saturated: true
      }
    ]
  };
}

function behavior(prompt: string): unknown {
  const segment = segmentName(prompt) || "Segment";
  return {
    zero_moment_of_truth: `${segment} users notice the problem when a manual process misses a deadline.`,
    alternative_paths: ["Spreadsheets", "Outsourced consultants"],
    retention_killers: ["Slow onboarding", "Opaque pricing"]
  };
}

function competition(prompt: string): unknown {
  const segment = segmentName(prompt) || "Segment";
  return {
    delivery_mechanisms: ["SaaS", "API"],
    product_feature_gaps: [`No self-serve option for ${segment}`],
    experience_gaps: ["Support is email only"],
    moat_assessment: "Incumbents rely on switching costs rather than network effects."
  };
}

function jury(prompt: string): unknown {
  const budget = Number(/BUDGET \(USD\):\s*(\d+)/.exec(prompt)?.[1] ?? 1_000_000);
  const ids = [...new Set([...prompt.matchAll(/"segment_id":\s*"([^"]+)"/g)].map((m) => m[1] ?? ""))].filter(Boolean);
  const share = ids.length > 0 ? Math.floor(budget / ids.length) : 0;
  return {
    conflict_check: "Growth figures and reported friction point the same way.",
    moat_assessment: "A focused entrant can survive where incumbents depend on switching costs.",
    executive_summary: `Offline verdict across ${ids.length} surviving segment(s).`,
    resource_allocation: {
      rationale: "Even split across surviving segments.",
      allocations: ids.map((id) => ({ segment_id: id, amount_usd: share, rationale: "Even split" }))
    },
    segment_verdicts: ids.map((id, i) => ({ segment_id: id, verdict: i === 0 ? "green" : "amber", rationale: "Offline verdict" }))
  };
}

/** Deterministic offline backend (`ATLAS_PIPELINE_MODE=fake`); answers are derived from the prompt text. */
export class FakeBackend implements GenerativeBackend {
  readonly name = "fake";
  private readonly delayMs: number;

  constructor(options: { delayMs?: number } = {}) {
    this.delayMs = options.delayMs ?? parseDelayMs();
  }

  async generate(request: GenerateRequest): Promise<string> {
    await abortableSleep(this.delayMs, request.signal);
    const body = (() => {
      switch (request.stage) {
        case "taxonomy":
          return taxonomy(request.prompt);
        case "segment":
          return segments(request.prompt);
        case "behavioral":
          return behavior(request.prompt);
        case "competitive":
          return competition(request.prompt);
        case "jury":
          return jury(request.prompt);
      }
    })();
    return JSON.stringify(body);
  }
}
