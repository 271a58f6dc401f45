// =============================================================================
// PDF SCAN — Backend Bundle
//
// The repositories and scanner one process runs with. Built once at startup
// and passed explicitly to whatever needs storage; the three repositories
// always share one backend kind.
// =============================================================================

import { BackendKind } from '../config';
import { IDocumentRepository, IFindingRepository, IMetricsRepository } from './repositories';
import { IScanner } from './scanner';

export interface Backends {
  readonly kind: BackendKind;
  readonly document: IDocumentRepository;
  readonly finding: IFindingRepository;
  readonly metrics: IMetricsRepository;
  readonly scanner: IScanner;
}
