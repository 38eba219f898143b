import type { AppError } from '@utils/errors';

export interface PerformanceTracker {
  start(name: string): void;
  end(name: string): number;
  getMetrics(): Record<string, number>;
}

/**
 * Fields every pipeline context carries. Services extend this with their own
 * inputs and stage outputs.
 */
export interface OperationContext {
  requestId: string;
  startTime: number;
  perfTracker: PerformanceTracker;
  results: Record<string, unknown>;
  errors: Error[];
  metadata: Record<string, unknown>;
  reasonCodes: string[];
  /** Aborted on timeout, external cancellation, or a critical stage failure */
  signal: AbortSignal;
}

export type Operation<TContext extends OperationContext> = (ctx: TContext) => Promise<TContext>;

export interface PipelineStage<TContext extends OperationContext> {
  name: string;
  operation: Operation<TContext>;
  /** A failing critical stage fails the run; others are logged and skipped */
  critical: boolean;
}

export interface OrchestratorConfig {
  name: string;
  /** Milliseconds before the run is aborted. 0 disables the timeout. */
  timeout: number;
  enableMetrics: boolean;
  logErrors: boolean;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface OrchestratorMetrics {
  durationMs: number;
  stages: Record<string, number>;
}

export type OrchestratorResult<T> =
  | { success: true; data: T; metrics?: OrchestratorMetrics }
  | { success: false; error: AppError; metrics?: OrchestratorMetrics };
