export * from '@/types/props';
export * from '@/types/engine-config';
export * from '@/types/game-logs';

export * from '@/lib/errors';
export * from '@/lib/engine-config';
export * from '@/lib/stats/stat-categories';
export * from '@/lib/stats/stat-aggregator';
export * from '@/lib/scoring/prop-scorer';
export * from '@/lib/tickets/seeded-random';
export * from '@/lib/tickets/ticket-assembler';
export * from '@/lib/tickets/ticket-export';
export * from '@/lib/props/prop-listing-parser';
export * from '@/lib/positional/positional-filter';
export * from '@/lib/api/game-logs';
export * from '@/lib/pipeline/prop-pipeline';
export { getSupabaseClient } from '@/integrations/supabase/client';
