/**
 * Handler and middleware types, and the composer that stacks them.
 *
 *   pipeline(logging, errors, validateBody(schema))(handler)
 *
 * runs logging outermost and the handler innermost.
 */

export interface HandlerContext {
  /** Correlates log lines for one request; set by the logging middleware. */
  requestId?: string;
  /** Parsed JSON object body, set by validateBody once the schema check passes. */
  body?: Record<string, unknown>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

export function pipeline(...middlewares: Middleware[]): (handler: Handler) => Handler {
  return (handler) => {
    let wrapped = handler;
    for (let i = middlewares.length - 1; i >= 0; i--) {
      wrapped = middlewares[i](wrapped);
    }
    return wrapped;
  };
}
