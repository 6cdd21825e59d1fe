import debugFactory from 'debug';

export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
};

/**
 * Step tracer on the `debug` package. Output follows `DEBUG=api-steps`, or is
 * forced on with `verbose`.
 */
export const createLogger = (namespace = 'api-steps', verbose = false): Logger => {
  const dbg = debugFactory(namespace);
  if (verbose) {
    dbg.enabled = true;
  }

  return {
    debug: (message, ...args) => dbg(message, ...args),
  };
};
