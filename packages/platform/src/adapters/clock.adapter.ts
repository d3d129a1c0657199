/**
 * Clock Port Adapters
 *
 * - **Clock.Live**: Effect's Clock service (real system time, nanosecond resolution)
 * - **Clock.Test**: Effect's TestClock service (time only moves when a test moves it)
 * - **Clock.Fixed**: a constant instant, for fixtures that need an exact `enclosedAt`
 *
 * @see packages/platform/src/ports/clock.port.ts - Port interface
 */

import * as Clock_ from 'effect/Clock'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as TestClock from 'effect/TestClock'

import { Timestamp } from '@letterbox/schemas/shared'

import { ClockPort, ClockUnavailable } from '../ports/clock.port.ts'

const fromEpochNanos = (epochNanos: bigint): Effect.Effect<Timestamp> =>
	epochNanos < 0n
		? Effect.die(new ClockUnavailable({ reason: `clock reads ${epochNanos}ns, before the Unix epoch` }))
		: Effect.succeed(Timestamp.fromEpochNanos(epochNanos))

export class Clock {
	/**
	 * Production clock backed by Effect's Clock service
	 *
	 * `Clock.currentTimeNanos` is anchored to the wall clock once and then advanced by the process' monotonic timer, so
	 * two reads in sequence never go backwards.
	 *
	 * Layer signature: `Layer<ClockPort, never, never>`
	 */
	static readonly Live: Layer.Layer<ClockPort> = Layer.succeed(
		ClockPort,
		ClockPort.of({
			now: () => Effect.flatMap(Clock_.currentTimeNanos, fromEpochNanos),
		}),
	)

	/**
	 * Test clock backed by Effect's TestClock service
	 *
	 * Requires `TestContext.TestContext` (provided automatically by `it.effect`). Millisecond resolution, which is all
	 * TestClock tracks.
	 */
	static readonly Test: Layer.Layer<ClockPort> = Layer.succeed(
		ClockPort,
		ClockPort.of({
			now: () =>
				Effect.flatMap(TestClock.currentTimeMillis, millis => fromEpochNanos(BigInt(Math.floor(millis)) * 1_000_000n)),
		}),
	)

	static readonly Fixed = (at: Timestamp): Layer.Layer<ClockPort> =>
		Layer.succeed(ClockPort, ClockPort.of({ now: () => Effect.succeed(at) }))
}
