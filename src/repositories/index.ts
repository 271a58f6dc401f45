// =============================================================================
// PDF SCAN — Repository Implementations
//
//   memory   — Map-backed reference implementations (default, tests)
//   postgres — durable implementations over a pg Pool
// =============================================================================

export {
  InMemoryDocumentRepository,
  InMemoryFindingRepository,
  InMemoryMetricsRepository,
} from './memory';
export {
  PostgresDocumentRepository,
  PostgresFindingRepository,
  PostgresMetricsRepository,
  runQuery,
} from './postgres';
export type { Queryable } from './postgres';
