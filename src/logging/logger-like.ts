/** Structural subset of a pino logger that library code accepts. */
export type LoggerLike = {
  debug: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
};
