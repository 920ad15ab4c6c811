/** The part of graphile-worker's job helpers the tasks use. */
export type TaskHelpers = {
  logger: {
    info(message: string): void;
    error(message: string): void;
  };
};
