/**
 * Type augmentation for Express Request.
 * Adds the `requestId` property attached by the requestLogger middleware.
 */

export {};

declare global {
  namespace Express {
    interface Request {
      /** Populated by requestLogger; echoed in the X-Request-Id header. */
      requestId?: string;
    }
  }
}
