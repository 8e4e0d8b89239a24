/**
 * A structured command ready for execution.
 * Steps never hand raw command strings to the executor; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
