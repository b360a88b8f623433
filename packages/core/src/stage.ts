import { logger as consoleLogger, type Logger, type StageName } from '@codecorpus/shared';

export interface StageOptions {
  logger?: Logger;
  /** Correlates the events of one invocation; defaults to the current time */
  runId?: string;
}

export interface StageContext {
  logger: Logger;
  runId: string;
}

export function resolveStageContext(stage: StageName, options: StageOptions): StageContext {
  return {
    logger: (options.logger ?? consoleLogger).child({ stage }),
    runId: options.runId || Date.now().toString(),
  };
}
