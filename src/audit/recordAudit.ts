/**
 * Fire-and-forget delivery to an {@link AuditSink}.
 *
 * A failing sink must never block or fail the operation being audited, so
 * both synchronous throws and rejections end up as a `warn` log entry.
 *
 * @module audit
 */

import type { Logger } from '../logging/logger.js';
import { asError } from '../logging/logger.js';
import type { AuditRecord, AuditSink } from './types.js';

export function recordAudit(sink: AuditSink | undefined, record: AuditRecord, logger: Logger): void {
  if (!sink) return;

  const onFailure = (err: unknown): void => {
    logger.warn('Audit sink rejected record', {
      action: record.action,
      outcome: record.outcome,
      target: record.target,
      error: asError(err).message,
    });
  };

  try {
    void sink.record(record).catch(onFailure);
  } catch (err) {
    onFailure(err);
  }
}
