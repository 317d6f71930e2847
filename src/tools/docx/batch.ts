/**
 * Batch mutation engine.
 *
 * Operations addressed by paragraph index run first, highest index first, so
 * inserting or deleting one paragraph never shifts the target of an
 * operation still waiting to run. Operations without a paragraph index run
 * after them in submission order. Every operation runs inside its own
 * failure boundary; nothing is rolled back.
 */

import { z } from 'zod';
import { DocxError, DocxErrorCode, errorMessage } from './errors.js';
import { applyOp } from './ops/index.js';
import { DocxOpSchema, OPERATION_KINDS } from './schemas.js';
import type { EditScope } from './scope.js';
import type { BatchReport, DocxOp, OpDetail } from './types.js';
import { logger } from '../../utils/logger.js';

const optionalNumber = z.number().optional().catch(undefined);

/** The fields every detail echoes, read leniently from unvalidated input. */
const OperationEnvelopeSchema = z.object({
    op: z.string().optional().catch(undefined),
    index: optionalNumber,
    table_index: optionalNumber,
    row: optionalNumber,
    col: optionalNumber,
    image_index: optionalNumber,
});

type OperationEnvelope = z.infer<typeof OperationEnvelopeSchema>;

interface PendingOperation {
    raw: unknown;
    envelope: OperationEnvelope;
}

function readEnvelope(raw: unknown): OperationEnvelope {
    const parsed = OperationEnvelopeSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
}

/**
 * Execution order: paragraph-indexed operations by descending index, then
 * the rest. Array#sort is stable, so ties keep submission order.
 */
export function orderOperations<T>(operations: readonly T[]): T[] {
    const keyed = operations.map((raw) => ({ raw, index: readEnvelope(raw).index }));
    keyed.sort((a, b) => {
        if (a.index === undefined) return b.index === undefined ? 0 : 1;
        if (b.index === undefined) return -1;
        return b.index - a.index;
    });
    return keyed.map((entry) => entry.raw);
}

/** Validate one raw operation record, applying defaults. */
export function parseOperation(raw: unknown): DocxOp {
    const { op } = readEnvelope(raw);
    if (op === undefined || !OPERATION_KINDS.has(op)) {
        throw new DocxError(`Unknown operation type: ${op ?? '(none)'}`, DocxErrorCode.UNKNOWN_OPERATION, { op });
    }

    const parsed = DocxOpSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        throw new DocxError(`Invalid ${op} operation: ${issues}`, DocxErrorCode.INVALID_OPERATION, { op });
    }
    return parsed.data;
}

function startDetail(envelope: OperationEnvelope): OpDetail {
    const detail: OpDetail = {
        op: envelope.op ?? 'unknown',
        index: envelope.index ?? null,
        status: 'ok',
    };
    if (envelope.table_index !== undefined) detail.table_index = envelope.table_index;
    if (envelope.row !== undefined) detail.row = envelope.row;
    if (envelope.col !== undefined) detail.col = envelope.col;
    if (envelope.image_index !== undefined) detail.image_index = envelope.image_index;
    return detail;
}

export function batchUpdate(scope: EditScope, operations: readonly unknown[]): BatchReport {
    const pending: PendingOperation[] = orderOperations(operations).map((raw) => ({
        raw,
        envelope: readEnvelope(raw),
    }));

    const report: BatchReport = { success: 0, failed: 0, details: [] };
    for (const { raw, envelope } of pending) {
        const detail = startDetail(envelope);
        try {
            Object.assign(detail, applyOp(scope, parseOperation(raw)));
            report.success++;
        } catch (error) {
            detail.status = 'error';
            detail.error = errorMessage(error);
            report.failed++;
            logger.debug(`Operation ${detail.op} failed: ${detail.error}`);
        }
        report.details.push(detail);
    }

    logger.info(`Batch applied: ${report.success} succeeded, ${report.failed} failed`);
    return report;
}
