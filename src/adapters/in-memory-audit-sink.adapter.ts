import type {
  AuditRecord,
  IAuditSink,
} from '../interfaces/audit-sink.interface';

/**
 * Keeps audit records in process memory. Suited to tests and to services
 * that drain records themselves.
 */
export class InMemoryAuditSink implements IAuditSink {
  private readonly records: AuditRecord[] = [];
  private readonly lastSequence = new Map<string, number>();

  record(record: AuditRecord): void {
    const previous = this.lastSequence.get(record.workflowId) ?? 0;
    if (record.sequence <= previous) {
      throw new Error(
        `Audit record #${record.sequence} for workflow ${record.workflowId} ` +
          `is not after #${previous}`,
      );
    }

    this.lastSequence.set(record.workflowId, record.sequence);
    this.records.push(record);
  }

  all(): AuditRecord[] {
    return [...this.records];
  }

  forEntity(entityId: string, workflowId?: string): AuditRecord[] {
    return this.records.filter(
      (record) =>
        record.entityId === entityId &&
        (workflowId === undefined || record.workflowId === workflowId),
    );
  }

  clear(): void {
    this.records.length = 0;
    this.lastSequence.clear();
  }
}
