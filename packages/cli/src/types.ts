export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  /** JSONL file receiving pipeline events */
  events?: string;
};

/** Process facts the commands read; tests substitute their own. */
export interface CliEnvironment {
  cwd: string;
  homeDir?: string;
}
