/**
 * DOCX Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 *
 * @module docx/errors
 */

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  INVALID_DOCX = 'INVALID_DOCX',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  NOT_TRULY_EMPTY = 'NOT_TRULY_EMPTY',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  UNKNOWN_OPERATION = 'UNKNOWN_OPERATION',
  INVALID_OPERATION = 'INVALID_OPERATION',
  DOCX_READ_FAILED = 'DOCX_READ_FAILED',
  DOCX_SAVE_FAILED = 'DOCX_SAVE_FAILED',
}

/** Build the range error raised for any index outside `0 <= index < count`. */
export function indexOutOfRange(kind: string, index: number, count: number): DocxError {
  const span = count > 0 ? `valid range 0..${count - 1}` : 'none present';
  return new DocxError(
    `${kind} index out of range: ${index} (${span})`,
    DocxErrorCode.INDEX_OUT_OF_RANGE,
    { kind, index, count }
  );
}

/** Throw a range error unless `index` addresses one of `count` elements. */
export function assertInRange(kind: string, index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw indexOutOfRange(kind, index, count);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wrap an async operation. DocxErrors pass through; anything else is wrapped with `errorCode`. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode | string,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    throw new DocxError(errorMessage(error), errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}
