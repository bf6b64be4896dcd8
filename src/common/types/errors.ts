/**
 * Base error types for the application
 * All module errors follow these shapes
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (network, timeouts, local files, external collaborators)
 */
export interface InfraError extends AppError {
  readonly type: 'NetworkError' | 'TimeoutError' | 'HttpError' | 'FileReadError' | 'StorageError';
  readonly retryable: boolean;
}

/**
 * Extracts a printable message from anything that was thrown.
 */
export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
};
