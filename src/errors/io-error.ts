import { EngineError } from './engine-error';
import { ErrorCode } from './types';
import { errnoCode } from '../utils/fs';

export type IOErrorCode = Extract<ErrorCode, 'IO_NOT_FOUND' | 'IO_PERMISSION_DENIED'>;

/**
 * A file the engine was pointed at could not be read.
 */
export class IOError extends EngineError {
  readonly filePath: string;

  constructor(message: string, filePath: string, code: IOErrorCode = 'IO_NOT_FOUND', cause?: unknown) {
    super({
      message,
      code,
      category: 'io',
      context: { data: { filePath } },
      cause,
    });
    this.filePath = filePath;
  }

  /**
   * Wrap a failed `fs` call, picking the code from its errno.
   */
  static fromFsError(message: string, filePath: string, error: unknown): IOError {
    const errno = errnoCode(error);
    const code: IOErrorCode = errno === 'EACCES' || errno === 'EPERM' ? 'IO_PERMISSION_DENIED' : 'IO_NOT_FOUND';
    return new IOError(message, filePath, code, error);
  }
}
