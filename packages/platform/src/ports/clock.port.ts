/**
 * ClockPort - Time source abstraction
 *
 * Supplies the current wall-clock time as a structured `Timestamp` when an envelope is sealed and when it is
 * unwrapped. Resolution is one nanosecond, so successive reads inside the same operation stay distinguishable.
 *
 * This port follows Effect's port/adapter pattern:
 *
 * - Port defines WHAT (interface) - the codec needs "now"
 * - Adapter defines HOW (implementation) - Effect Clock, TestClock, or a fixed instant
 *
 * Reading the clock has no typed failure. A clock that cannot produce a post-epoch reading is an environment fault:
 * adapters die with `ClockUnavailable` instead of surfacing it in the error channel.
 *
 * @see packages/platform/src/adapters/clock.adapter.ts - Live, Test and Fixed implementations
 */

import * as Context from 'effect/Context'
import * as Data from 'effect/Data'
import type * as Effect from 'effect/Effect'

import type { Timestamp } from '@letterbox/schemas/shared'

/**
 * ClockUnavailable - The system clock could not be read
 *
 * Raised as a defect (`Effect.die`), never as a recoverable failure.
 */
export class ClockUnavailable extends Data.TaggedError('ClockUnavailable')<{ readonly reason: string }> {}

export class ClockPort extends Context.Tag('@letterbox/platform/ports/ClockPort')<
	ClockPort,
	{
		/**
		 * Get the current wall-clock time
		 *
		 * @example
		 *
		 * ```typescript
		 * import * as Effect from "effect/Effect"
		 * import * as Adapters from "../adapters/index.ts"
		 *
		 * const sealedAt = Effect.gen(function* () {
		 *   const clock = yield* ClockPort
		 *   return yield* clock.now()
		 * })
		 *
		 * sealedAt.pipe(Effect.provide(Adapters.Clock.Live))
		 * // Effect.Effect<Timestamp, never, never>
		 * ```
		 */
		readonly now: () => Effect.Effect<Timestamp>
	}
>() {}

export declare namespace ClockPort {
	type Type = Context.Tag.Service<ClockPort>
}
