import type { ConcurrencyLimiter } from "./limiter.js";
import type { StageRole } from "./schemas.js";
import { buildStageContext, STAGE_DEFINITIONS, type StageDefinition, type StageItems, type StageOutputs } from "./stages.js";
import type { RetryPolicy, StageResult, StructuredCallClient } from "./structured_client.js";

export type StageOutcome<TItem, TOut> = {
  item: TItem;
  result: StageResult<TOut>;
};

export type RoleOutcome<R extends StageRole> = StageOutcome<StageItems[R], StageOutputs[R]>;

export type RunStageArgs<R extends StageRole> = {
  role: R;
  items: ReadonlyArray<StageItems[R]>;
  summary: string;
  client: StructuredCallClient;
  limiter: ConcurrencyLimiter;
  model: string;
  policy: RetryPolicy;
  signal?: AbortSignal;
  onItemSettled?: (outcome: RoleOutcome<R>, index: number) => void;
};

/**
 * Runs one stage: one validated call per upstream item, dispatched through the shared limiter.
 * The returned outcomes follow the order of `items`, whatever order the calls finish in.
 * A fatal result halts dispatch of items that have not started yet.
 */
export async function runStage<R extends StageRole>(args: RunStageArgs<R>): Promise<Array<RoleOutcome<R>>> {
  const { role, items, summary, client, limiter, model, policy, signal, onItemSettled } = args;
  const definition: StageDefinition<R> = STAGE_DEFINITIONS[role];

  const halt = new AbortController();
  const onAbort = () => halt.abort();
  if (signal?.aborted) halt.abort();
  else signal?.addEventListener("abort", onAbort, { once: true });

  const runItem = async (item: StageItems[R], index: number): Promise<RoleOutcome<R>> => {
    let result: StageResult<StageOutputs[R]>;
    if (halt.signal.aborted) {
      result = { ok: false, kind: "cancelled", message: "Not dispatched: stage halted", attempts: 0 };
    } else {
      const context = buildStageContext(item, summary);
      result = await client.invoke({
        stage: role,
        label: definition.describeItem(item),
        model,
        instructions: definition.instructions,
        prompt: definition.buildPrompt(context),
        schema: definition.schema,
        policy,
        signal: halt.signal
      });
      if (!result.ok && result.kind === "fatal") halt.abort();
    }

    const outcome: RoleOutcome<R> = { item, result };
    onItemSettled?.(outcome, index);
    return outcome;
  };

  try {
    return await Promise.all(items.map((item, index) => limiter.run(() => runItem(item, index))));
  } finally {
    signal?.removeEventListener("abort", onAbort);
  }
}
