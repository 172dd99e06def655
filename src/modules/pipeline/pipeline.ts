/**
 * Pipeline — sequences fallible steps and stops at the first failure.
 *
 * Each step receives the previous step's value. A step fails by throwing
 * or, for `stepResult`, by returning an Err. The pipeline then returns
 * `{ ok: false, error: { step, error } }` naming the step that failed;
 * later steps do not run and nothing earlier is rolled back.
 *
 * @example
 * const result = await pipeline<string>()
 *   .step('allocate-id', (title) => stories.allocateId(ctx).then((id) => ({ id, title })))
 *   .step('create-story', (s) => stories.create(ctx, s))
 *   .run(ctx, 'Add retry to uploads')
 */

import type { InvocationContext } from '../../core/context.js'
import { toStoryloomError, type StoryloomError } from '../../core/errors.js'
import { err, ok, type Result } from '../../core/result.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The step a pipeline stopped at and why */
export interface PipelineFailure {
  step: string
  error: StoryloomError
  /** What to run to finish the work the pipeline left undone */
  hint?: string
}

export type PipelineResult<T> = Result<T, PipelineFailure>

type Runner<I, T> = (ctx: InvocationContext, input: I) => Promise<PipelineResult<T>>

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Pipeline<I, T> {
  /** Step names, in execution order */
  readonly steps: readonly string[]
  private readonly _run: Runner<I, T>

  constructor(run: Runner<I, T>, steps: readonly string[]) {
    this._run = run
    this.steps = steps
  }

  /** Append a step that fails by throwing */
  step<U>(name: string, fn: (value: T) => Promise<U>): Pipeline<I, U> {
    return this.stepResult(name, (value) => fn(value).then((next) => ok(next)))
  }

  /** Append a step that reports failure as an Err value */
  stepResult<U>(
    name: string,
    fn: (value: T) => Result<U, StoryloomError> | Promise<Result<U, StoryloomError>>,
  ): Pipeline<I, U> {
    const previous = this._run
    return new Pipeline<I, U>(async (ctx, input) => {
      const prior = await previous(ctx, input)
      if (!prior.ok) return prior

      ctx.logger.debug({ step: name }, 'Pipeline step started')
      let outcome: Result<U, StoryloomError>
      try {
        outcome = await fn(prior.value)
      } catch (error) {
        outcome = err(toStoryloomError(error))
      }

      if (!outcome.ok) {
        ctx.logger.debug({ step: name, code: outcome.error.code }, 'Pipeline step failed')
        return err({ step: name, error: outcome.error })
      }
      return outcome
    }, [...this.steps, name])
  }

  run(ctx: InvocationContext, input: I): Promise<PipelineResult<T>> {
    return this._run(ctx, input)
  }
}

/** Start an empty pipeline whose first step receives `I` */
export function pipeline<I>(): Pipeline<I, I> {
  return new Pipeline<I, I>(async (_ctx, input) => ok(input), [])
}
