export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type DispatchMode = 'sequential' | 'parallel';

export interface CLIOptions {
  segmentLength?: number;
  overlap?: number;
  concurrency?: number;
  providers?: string;
  fallback?: boolean;
  minConfidence?: number;
  timeBudget?: number;
  cache?: boolean;
  enrich?: boolean;
  output?: string;
  verbose?: boolean;
}
