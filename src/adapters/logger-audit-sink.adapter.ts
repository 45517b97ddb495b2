import { Logger } from '@nestjs/common';
import type {
  AuditRecord,
  IAuditSink,
} from '../interfaces/audit-sink.interface';

export class LoggerAuditSink implements IAuditSink {
  constructor(private readonly logger = new Logger(LoggerAuditSink.name)) {}

  record(record: AuditRecord): void {
    const notes = record.context.notes ? ` notes="${record.context.notes}"` : '';
    this.logger.log(
      `#${record.sequence} ${record.workflowId}/${record.entityId}: ` +
        `${record.fromState} -> ${record.toState} by ${record.context.actor}${notes}`,
    );
  }
}
