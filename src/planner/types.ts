export type OutputFormat = "markdown" | "csv";

export type Task = {
  /** Plan-scoped identifier, e.g. "1". */
  id: string;
  /** Filesystem-safe slug used in output file names. */
  name: string;
  prompt: string;
  outputFormat: OutputFormat;
};

/** Produced once per generation request and never mutated afterwards. */
export type WorkflowPlan = {
  readonly name: string;
  readonly tasks: readonly Task[];
};
