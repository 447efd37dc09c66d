/**
 * An error that is the user's to fix
 *
 * Reported as a single line, without a stack trace.
 */
export class SimpleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Errors from `fs` may come from another realm, so check the shape and not the class
 */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return typeof e === 'object' && e !== null && 'code' in e;
}
