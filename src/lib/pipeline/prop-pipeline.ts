// ============================================================================
// PROP PIPELINE
// ============================================================================
// props -> aggregator (season + recent windows) -> scorer -> strategy pool ->
// ticket assembler. Per-prop failures become `skipped` entries; only an
// invalid configuration stops the run.
// ============================================================================

import { formatISO } from 'date-fns';
import {
  errorMessage,
  InvalidConfigurationError,
  PlayerNotFoundError,
  UnsupportedStatCategoryError,
} from '@/lib/errors';
import { RECENT_WINDOW, resolveEngineConfig } from '@/lib/engine-config';
import {
  analyzePositionalProps,
  comparePositionalPicks,
  type PositionalAnalysis,
} from '@/lib/positional/positional-filter';
import { scoreProp } from '@/lib/scoring/prop-scorer';
import { StatAggregator } from '@/lib/stats/stat-aggregator';
import { generateTickets } from '@/lib/tickets/ticket-assembler';
import { randomSeed } from '@/lib/tickets/seeded-random';
import type { EngineConfigOverrides, TicketStrategy } from '@/types/engine-config';
import type { GameLogSource } from '@/types/game-logs';
import type { Prop, ScoredProp, TicketBatch } from '@/types/props';

export type SkipReason =
  | 'PLAYER_NOT_FOUND'
  | 'UNSUPPORTED_STAT'
  | 'INSUFFICIENT_HISTORY'
  | 'SOURCE_ERROR';

export interface SkippedProp {
  prop: Prop;
  reason: SkipReason;
  message: string;
}

export interface PropPipelineInput {
  props: Prop[];
  source: GameLogSource;
  config?: EngineConfigOverrides;
  seed?: number;               // Random when omitted; the batch reports the one used
  strategy?: TicketStrategy;
  now?: Date;
}

export interface PropPipelineResult {
  scored: ScoredProp[];              // Includes zero-scored props with no history
  skipped: SkippedProp[];
  positional: PositionalAnalysis | null;   // Set for the positional strategy
  batch: TicketBatch;
  generated_at: string;
}

function classifyFailure(err: unknown): SkipReason {
  if (err instanceof PlayerNotFoundError) return 'PLAYER_NOT_FOUND';
  if (err instanceof UnsupportedStatCategoryError) return 'UNSUPPORTED_STAT';
  return 'SOURCE_ERROR';
}

export async function runPropPipeline(input: PropPipelineInput): Promise<PropPipelineResult> {
  const strategy = input.strategy ?? 'standard';
  const config = resolveEngineConfig(input.config, strategy);
  const seed = input.seed ?? randomSeed();
  if (!Number.isInteger(seed)) {
    throw new InvalidConfigurationError([`seed must be an integer (got ${seed})`]);
  }

  const aggregator = new StatAggregator(input.source, { season_lookback: config.season_lookback });
  const scored: ScoredProp[] = [];
  const skipped: SkippedProp[] = [];

  console.log(`[prop-pipeline] Scoring ${input.props.length} props (${strategy} strategy)`);

  for (const prop of input.props) {
    try {
      const season = await aggregator.fetchRecentOutcomes(prop, prop.stat_category, config.season_lookback);
      const recent = await aggregator.fetchRecentOutcomes(prop, prop.stat_category, RECENT_WINDOW);
      const result = scoreProp(prop, season, recent, config);
      scored.push(result);

      if (result.sample_size === 0) {
        skipped.push({
          prop,
          reason: 'INSUFFICIENT_HISTORY',
          message: `No ${prop.stat_category} history for ${prop.player_name}`,
        });
      }
    } catch (err) {
      const reason = classifyFailure(err);
      const message = errorMessage(err);
      console.warn(`[prop-pipeline] ⚠️ Skipped ${prop.player_name} ${prop.stat_category}: ${message}`);
      skipped.push({ prop, reason, message });
    }
  }

  let positional: PositionalAnalysis | null = null;
  let batch: TicketBatch;
  if (strategy === 'positional') {
    positional = analyzePositionalProps(scored);
    batch = generateTickets(positional.positional, { ...config, seed }, comparePositionalPicks);
  } else {
    batch = generateTickets(scored, { ...config, seed });
  }

  console.log(`[prop-pipeline] Scored ${scored.length}, skipped ${skipped.length}, ${batch.tickets.length} tickets (seed ${seed})`);

  return {
    scored,
    skipped,
    positional,
    batch,
    generated_at: formatISO(input.now ?? new Date()),
  };
}
