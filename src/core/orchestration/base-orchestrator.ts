import { randomUUID } from 'node:crypto';
import { CancelledError, TimeoutError, toAppError } from '@utils/errors';
import { createLogger } from '@utils/logger';
import type {
  ExecuteOptions,
  OperationContext,
  OrchestratorConfig,
  OrchestratorResult,
  PipelineStage,
} from './types';

const logger = createLogger('orchestrator');

/**
 * Runs a fixed list of stages over a shared context.
 *
 * Subclasses supply the context, the stages and the final projection. The
 * base class owns cancellation: each run gets its own AbortController that
 * fires on timeout, on the caller's signal, or when a critical stage throws.
 */
export abstract class BaseOrchestrator<
  TContext extends OperationContext,
  TResult,
  TInput,
> {
  protected readonly config: OrchestratorConfig;

  constructor(config: OrchestratorConfig) {
    this.config = config;
  }

  getName(): string {
    return this.config.name;
  }

  protected abstract initializeContext(input: TInput, signal: AbortSignal): Promise<TContext>;
  protected abstract getPipeline(): PipelineStage<TContext>[];
  protected abstract buildResult(ctx: TContext): TResult;

  protected createRequestId(): string {
    return randomUUID().slice(0, 8);
  }

  async execute(input: TInput, options: ExecuteOptions = {}): Promise<OrchestratorResult<TResult>> {
    const controller = new AbortController();
    const startedAt = performance.now();

    const onExternalAbort = (): void => {
      controller.abort(options.signal?.reason ?? new CancelledError());
    };
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const timer =
      this.config.timeout > 0
        ? setTimeout(() => {
            controller.abort(
              new TimeoutError(`${this.config.name} timed out after ${this.config.timeout}ms`)
            );
          }, this.config.timeout)
        : undefined;

    let ctx: TContext | undefined;
    try {
      ctx = await this.initializeContext(input, controller.signal);
      ctx = await this.runPipeline(ctx, controller);
      const data = this.buildResult(ctx);
      return { success: true, data, metrics: this.collectMetrics(ctx, startedAt) };
    } catch (error) {
      const appError = toAppError(error);
      if (this.config.logErrors) {
        logger.error(
          { err: appError, orchestrator: this.config.name, requestId: ctx?.requestId },
          'Pipeline failed'
        );
      }
      return { success: false, error: appError, metrics: this.collectMetrics(ctx, startedAt) };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  private async runPipeline(initial: TContext, controller: AbortController): Promise<TContext> {
    let ctx = initial;

    for (const stage of this.getPipeline()) {
      if (controller.signal.aborted) {
        throw controller.signal.reason;
      }

      ctx.perfTracker.start(stage.name);
      try {
        ctx = await this.raceAbort(stage.operation(ctx), controller.signal);
      } catch (error) {
        const stageError = error instanceof Error ? error : new Error(String(error));
        ctx.errors.push(stageError);

        if (stage.critical || controller.signal.aborted) {
          if (!controller.signal.aborted) controller.abort(stageError);
          throw stageError;
        }

        logger.warn(
          { err: stageError, stage: stage.name, requestId: ctx.requestId },
          'Non-critical stage failed, continuing'
        );
        ctx.reasonCodes.push(`${stage.name}_failed`);
      } finally {
        ctx.perfTracker.end(stage.name);
      }
    }

    return ctx;
  }

  // Stages observe ctx.signal themselves; this stops the run from waiting on one that does not.
  private raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private collectMetrics(ctx: TContext | undefined, startedAt: number) {
    if (!this.config.enableMetrics) return undefined;
    return {
      durationMs: performance.now() - startedAt,
      stages: ctx?.perfTracker.getMetrics() ?? {},
    };
  }
}
