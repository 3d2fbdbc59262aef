import type { QueryLogConfig } from './config.js';
import type { Logger } from './logger.js';

const QUERY_TYPES = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'TRANSACTION', 'DDL', 'OTHER'] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

export interface QueryTypeStats {
  count: number;
  errors: number;
  durationMs: number;
}

export interface StatementStats {
  /** Statement handles acquired on this connection. */
  prepared: number;
  /** Statement handles finalized (reference count reached zero). */
  finalized: number;
  /** Handles acquired but not yet finalized. */
  live: number;
  totalQueries: number;
  totalErrors: number;
  totalDurationMs: number;
  byType: Partial<Record<QueryType, QueryTypeStats>>;
}

export function getQueryType(text: string): QueryType {
  const trimmed = text.trim().toUpperCase();
  if (trimmed.startsWith('SELECT') || trimmed.startsWith('WITH')) return 'SELECT';
  if (trimmed.startsWith('INSERT') || trimmed.startsWith('REPLACE')) return 'INSERT';
  if (trimmed.startsWith('UPDATE')) return 'UPDATE';
  if (trimmed.startsWith('DELETE')) return 'DELETE';
  if (
    trimmed.startsWith('BEGIN') ||
    trimmed.startsWith('COMMIT') ||
    trimmed.startsWith('END') ||
    trimmed.startsWith('ROLLBACK') ||
    trimmed.startsWith('SAVEPOINT') ||
    trimmed.startsWith('RELEASE')
  ) {
    return 'TRANSACTION';
  }
  if (trimmed.startsWith('CREATE') || trimmed.startsWith('ALTER') || trimmed.startsWith('DROP')) {
    return 'DDL';
  }
  return 'OTHER';
}

function emptyStats(): StatementStats {
  return {
    prepared: 0,
    finalized: 0,
    live: 0,
    totalQueries: 0,
    totalErrors: 0,
    totalDurationMs: 0,
    byType: {},
  };
}

/**
 * Per-connection statement lifecycle counters, query classification,
 * logging and stats.
 */
export class StatementObserver {
  private stats: StatementStats = emptyStats();

  constructor(
    private logger: Logger,
    private logConfig: QueryLogConfig,
  ) {}

  recordPrepare(sql: string): void {
    this.stats.prepared++;
    this.stats.live++;
    this.logger.debug('[sqlite] prepared', { sql: sql.slice(0, 100) });
  }

  recordFinalize(sql: string): void {
    this.stats.finalized++;
    this.stats.live--;
    this.logger.debug('[sqlite] finalized', { sql: sql.slice(0, 100) });
  }

  recordQuery(
    text: string,
    params: readonly unknown[] | undefined,
    durationMs: number,
    isError: boolean,
  ): void {
    const queryType = getQueryType(text);
    this.stats.totalQueries++;
    this.stats.totalDurationMs += durationMs;
    if (isError) {
      this.stats.totalErrors++;
    }

    const typeStats = this.stats.byType[queryType] ?? { count: 0, errors: 0, durationMs: 0 };
    this.stats.byType[queryType] = typeStats;
    typeStats.count++;
    typeStats.durationMs += durationMs;
    if (isError) {
      typeStats.errors++;
      return;
    }

    const shouldLog =
      this.logConfig.logAll || durationMs >= this.logConfig.slowQueryThresholdMs;
    if (!shouldLog) return;

    const paramInfo = this.logConfig.logParams && params?.length
      ? ` params=${JSON.stringify(params, (_key, value: unknown) => typeof value === 'bigint' ? value.toString() : value)}`
      : '';
    const slowTag = durationMs >= this.logConfig.slowQueryThresholdMs ? ' [SLOW]' : '';
    this.logger.info(`[sqlite]${slowTag} ${durationMs}ms: ${text.slice(0, 100)}${paramInfo}`);
  }

  configureLogging(config: Partial<QueryLogConfig>): void {
    this.logConfig = { ...this.logConfig, ...config };
  }

  getStatsSnapshot(): StatementStats {
    const byType: Partial<Record<QueryType, QueryTypeStats>> = {};
    for (const type of QUERY_TYPES) {
      const typeStats = this.stats.byType[type];
      if (typeStats) byType[type] = { ...typeStats };
    }
    return { ...this.stats, byType };
  }

  /** Resets query counters; handle lifecycle counters keep tracking live handles. */
  resetStats(): void {
    const { prepared, finalized, live } = this.stats;
    this.stats = { ...emptyStats(), prepared, finalized, live };
  }
}
