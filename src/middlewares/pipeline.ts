import type { ToolHandler, ToolMiddleware } from './types.js';

/**
 * Composes middlewares around a handler. The last middleware is the
 * outermost: in `pipe([a, b], h)` a call runs `b`, then `a`, then `h`.
 */
export function pipe(middlewares: readonly ToolMiddleware[], handler: ToolHandler): ToolHandler {
  return middlewares.reduce<ToolHandler>((next, middleware) => (req) => middleware(req, next), handler);
}
