// =============================================================================
// PDF SCAN — In-Memory Finding Repository
// =============================================================================

import { Finding, FindingType } from '../../types/entities';
import { IFindingRepository } from '../../types/repositories';

/** Highest confidence first; stable, so ties stay in insertion order. */
function byConfidenceDesc(findings: Finding[]): Finding[] {
  return findings.sort((a, b) => b.confidence - a.confidence);
}

export class InMemoryFindingRepository implements IFindingRepository {
  readonly backendName = 'memory';
  private findings = new Map<string, Finding>();

  async store(finding: Finding): Promise<void> {
    this.findings.set(finding.id, finding);
  }

  async getByDocument(documentId: string): Promise<Finding[]> {
    return byConfidenceDesc(
      [...this.findings.values()].filter(f => f.documentId === documentId)
    );
  }

  async getAll(limit: number, offset: number, findingType?: FindingType): Promise<Finding[]> {
    const matching = findingType
      ? [...this.findings.values()].filter(f => f.findingType === findingType)
      : [...this.findings.values()];

    return byConfidenceDesc(matching).slice(offset, offset + limit);
  }

  async count(documentId?: string, findingType?: FindingType): Promise<number> {
    if (documentId === undefined && findingType === undefined) return this.findings.size;

    let total = 0;
    for (const finding of this.findings.values()) {
      if (documentId !== undefined && finding.documentId !== documentId) continue;
      if (findingType !== undefined && finding.findingType !== findingType) continue;
      total++;
    }
    return total;
  }
}
