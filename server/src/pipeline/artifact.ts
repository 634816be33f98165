import type { JuryVerdict } from "./jury.js";
import {
  FAN_OUT_STAGES,
  type BehavioralOutput,
  type CompetitiveOutput,
  type SegmentProfile,
  type StageRole,
  type TaxonomyCategory,
  type TaxonomyOutput
} from "./schemas.js";
import type { FailureKind } from "./structured_client.js";
import { nowIso } from "./utils.js";

export type SegmentNode = SegmentProfile & {
  id: string;
  categoryId: string;
  categoryName: string;
  behavior: BehavioralOutput | null;
  competition: CompetitiveOutput | null;
};

export type CategoryNode = TaxonomyCategory & {
  id: string;
  segments: SegmentNode[];
};

export type DroppedItem = {
  stage: StageRole;
  itemId: string;
  label: string;
  kind: FailureKind;
  message: string;
  attempts: number;
};

export type CoverageNotice = {
  partial: boolean;
  droppedCount: number;
  truncatedCategories: number;
  truncatedSegments: number;
};

export type ResearchArtifact = {
  industry: string;
  summary: string;
  createdAt: string;
  categories: CategoryNode[];
  jury: JuryVerdict | null;
  dropped: DroppedItem[];
  coverage: CoverageNotice;
  status: "building" | "frozen";
  frozenAt?: string;
};

export class ArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArtifactError";
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function capped<T>(items: readonly T[], max: number | null): { kept: T[]; truncated: number } {
  if (max === null || items.length <= max) return { kept: [...items], truncated: 0 };
  return { kept: items.slice(0, max), truncated: items.length - max };
}

/**
 * Accumulates stage output into the research tree. Every slot is written at most once; a frozen
 * artifact rejects all writes. Readers get deep copies via `snapshot()`.
 */
export class ArtifactBuilder {
  private readonly state: ResearchArtifact;
  private readonly categoryById = new Map<string, CategoryNode>();
  private readonly segmentById = new Map<string, SegmentNode>();
  private readonly segmentsAttached = new Set<string>();
  private taxonomyAttached = false;

  constructor(industry: string, createdAt = nowIso()) {
    this.state = {
      industry,
      summary: "",
      createdAt,
      categories: [],
      jury: null,
      dropped: [],
      coverage: { partial: false, droppedCount: 0, truncatedCategories: 0, truncatedSegments: 0 },
      status: "building"
    };
  }

  get frozen(): boolean {
    return this.state.status === "frozen";
  }

  attachTaxonomy(output: TaxonomyOutput, maxCategories: number | null): CategoryNode[] {
    this.assertWritable();
    if (this.taxonomyAttached) throw new ArtifactError("Taxonomy is already attached");
    this.taxonomyAttached = true;

    const { kept, truncated } = capped(output.categories, maxCategories);
    if (output.industry.trim().length > 0) this.state.industry = output.industry.trim();
    this.state.summary = output.summary;
    this.state.coverage.truncatedCategories = truncated;

    kept.forEach((category, i) => {
      const node: CategoryNode = { ...category, trends: [...category.trends], id: `c${i + 1}`, segments: [] };
      this.state.categories.push(node);
      this.categoryById.set(node.id, node);
    });
    return structuredClone(this.state.categories);
  }

  attachSegments(categoryId: string, segments: readonly SegmentProfile[], maxSegments: number | null): SegmentNode[] {
    this.assertWritable();
    const category = this.categoryById.get(categoryId);
    if (!category) throw new ArtifactError(`Unknown category: ${categoryId}`);
    if (this.segmentsAttached.has(categoryId)) throw new ArtifactError(`Segments already attached for ${categoryId}`);
    this.segmentsAttached.add(categoryId);

    const { kept, truncated } = capped(segments, maxSegments);
    this.state.coverage.truncatedSegments += truncated;

    kept.forEach((segment, i) => {
      const node: SegmentNode = {
        ...segment,
        growth_drivers: [...segment.growth_drivers],
        id: `${categoryId}.s${i + 1}`,
        categoryId,
        categoryName: category.name,
        behavior: null,
        competition: null
      };
      category.segments.push(node);
      this.segmentById.set(node.id, node);
    });
    return structuredClone(category.segments);
  }

  attachBehavior(segmentId: string, profile: BehavioralOutput): void {
    this.assertWritable();
    const segment = this.requireSegment(segmentId);
    if (segment.behavior) throw new ArtifactError(`Behavioral profile already attached for ${segmentId}`);
    segment.behavior = structuredClone(profile);
  }

  attachCompetition(segmentId: string, profile: CompetitiveOutput): void {
    this.assertWritable();
    const segment = this.requireSegment(segmentId);
    if (!segment.behavior) throw new ArtifactError(`Competitive profile needs a behavioral profile first (${segmentId})`);
    if (segment.competition) throw new ArtifactError(`Competitive profile already attached for ${segmentId}`);
    segment.competition = structuredClone(profile);
  }

  attachJury(verdict: JuryVerdict): void {
    this.assertWritable();
    if (this.state.jury) throw new ArtifactError("Jury verdict is already attached");
    this.state.jury = structuredClone(verdict);
  }

  recordDropped(item: DroppedItem): void {
    this.assertWritable();
    if (!FAN_OUT_STAGES.has(item.stage)) throw new ArtifactError(`Only fan-out items can be dropped (${item.stage})`);
    this.state.dropped.push({ ...item });
    this.state.coverage.droppedCount = this.state.dropped.length;
    this.state.coverage.partial = true;
  }

  snapshot(): ResearchArtifact {
    return structuredClone(this.state);
  }

  freeze(at = nowIso()): ResearchArtifact {
    if (!this.frozen) {
      this.state.status = "frozen";
      this.state.frozenAt = at;
    }
    return deepFreeze(this.snapshot());
  }

  private requireSegment(segmentId: string): SegmentNode {
    const segment = this.segmentById.get(segmentId);
    if (!segment) throw new ArtifactError(`Unknown segment: ${segmentId}`);
    return segment;
  }

  private assertWritable(): void {
    if (this.frozen) throw new ArtifactError("Artifact is frozen");
  }
}

export function allSegments(artifact: ResearchArtifact): SegmentNode[] {
  return artifact.categories.flatMap((c) => c.segments);
}

/** Segments that made it through every fan-out stage. */
export function survivingSegments(artifact: ResearchArtifact): SegmentNode[] {
  return allSegments(artifact).filter((s) => s.behavior !== null && s.competition !== null);
}

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
}

/**
 * Short digest of what has already been accepted into the artifact. It is the only run-wide context a
 * per-item call receives.
 */
export function rollingSummary(artifact: ResearchArtifact, maxChars = 600): string {
  const lines: string[] = [`Industry: ${artifact.industry}.`];
  if (artifact.summary.trim().length > 0) lines.push(artifact.summary.trim());
  if (artifact.categories.length > 0) {
    lines.push(`Categories (${artifact.categories.length}): ${artifact.categories.map((c) => c.name).join(", ")}.`);
  }
  const segments = allSegments(artifact);
  if (segments.length > 0) {
    const profiled = segments.filter((s) => s.behavior !== null).length;
    lines.push(`Segments identified: ${segments.length}; behaviorally profiled: ${profiled}.`);
  }
  return truncate(lines.join(" "), maxChars);
}
