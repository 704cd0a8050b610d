export interface AppError extends Error {
  statusCode?: number;
  code?: string;
}

/**
 * Builds an Error carrying the HTTP status and machine-readable code that
 * the error middleware renders.
 */
export const createAppError = (
  message: string,
  statusCode: number,
  code: string,
  cause?: unknown
): AppError => {
  const error: AppError = new Error(message, cause === undefined ? undefined : { cause });
  error.statusCode = statusCode;
  error.code = code;
  return error;
};

/**
 * True for fs errors meaning "nothing at this path". Checks the shape only:
 * errors raised by fs under Jest come from another realm's Error class.
 */
export const isMissingPathError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  (error.code === 'ENOENT' || error.code === 'ENOTDIR');
