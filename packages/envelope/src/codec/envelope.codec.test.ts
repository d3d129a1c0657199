import { describe, expect, it } from '@effect/vitest'
import * as Cause from 'effect/Cause'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Exit from 'effect/Exit'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'
import * as TestClock from 'effect/TestClock'

import { Clock } from '@letterbox/platform/adapters'
import { Timestamp } from '@letterbox/schemas/shared'

import { EnclosedAtInFuture, enclose, encloseSync, unwrap, unwrapSync } from './envelope.codec.ts'

const text = (value: string) => new TextEncoder().encode(value)

describe('envelope codec', () => {
	describe('enclose/unwrap', () => {
		it.effect('stamps enclosedAt on send and receivedAt on arrival', () =>
			Effect.gen(function* () {
				yield* TestClock.setTime(1_700_000_000_250)
				const message = yield* enclose(text('test'))

				yield* TestClock.adjust(Duration.seconds(1))
				const result = yield* unwrap(message)

				expect(result.enclosedAt.seconds).toBe(1_700_000_000)
				expect(result.enclosedAt.nanos).toBe(250_000_000)
				expect(result.receivedAt.seconds).toBe(1_700_000_001)
				expect(result.receivedAt.nanos).toBe(250_000_000)
				expect(new TextDecoder().decode(result.payload)).toBe('test')
			}).pipe(Effect.provide(Clock.Test)),
		)

		it.effect('round-trips an empty payload', () =>
			Effect.gen(function* () {
				const result = yield* unwrap(yield* enclose(new Uint8Array()))

				expect(result.payload).toStrictEqual(new Uint8Array())
			}).pipe(Effect.provide(Clock.Test)),
		)

		it.effect('uses an explicit enclosedAt instead of the clock', () =>
			Effect.gen(function* () {
				const sealedAt = new Timestamp({ nanos: 7, seconds: 1_000 })
				const message = yield* enclose(text('late'), { enclosedAt: sealedAt })
				const result = yield* unwrap(message)

				expect(result.enclosedAt.seconds).toBe(1_000)
				expect(result.enclosedAt.nanos).toBe(7)
				expect(result.receivedAt.seconds).toBe(2_000)
			}).pipe(Effect.provide(Clock.Fixed(new Timestamp({ nanos: 0, seconds: 2_000 })))),
		)

		it.effect('does not reject an envelope from a clock ahead of ours', () =>
			Effect.gen(function* () {
				const message = yield* enclose(text('skewed')).pipe(
					Effect.provide(Clock.Fixed(new Timestamp({ nanos: 0, seconds: 9_000 }))),
				)
				const result = yield* unwrap(message).pipe(
					Effect.provide(Clock.Fixed(new Timestamp({ nanos: 0, seconds: 2_000 }))),
				)

				expect(result.enclosedAt.seconds).toBe(9_000)
				expect(result.receivedAt.seconds).toBe(2_000)
			}),
		)

		it.effect('dies when an explicit enclosedAt is later than the clock', () =>
			Effect.gen(function* () {
				const exit = yield* Effect.exit(
					enclose(text('early'), { enclosedAt: new Timestamp({ nanos: 1, seconds: 2_000 }) }),
				)

				expect(Exit.isFailure(exit)).toBe(true)
				if (Exit.isFailure(exit)) {
					const defect = Cause.dieOption(exit.cause)
					expect(Option.getOrThrow(defect)).toBeInstanceOf(EnclosedAtInFuture)
				}
			}).pipe(Effect.provide(Clock.Fixed(new Timestamp({ nanos: 0, seconds: 2_000 })))),
		)

		it.effect('accepts an explicit enclosedAt equal to the clock', () =>
			Effect.gen(function* () {
				const message = yield* enclose(text('now'), { enclosedAt: new Timestamp({ nanos: 0, seconds: 2_000 }) })
				const result = yield* unwrap(message)

				expect(result.enclosedAt.seconds).toBe(2_000)
			}).pipe(Effect.provide(Clock.Fixed(new Timestamp({ nanos: 0, seconds: 2_000 })))),
		)

		it.prop('round-trips any payload', [Schema.Uint8ArrayFromSelf], ([payload]) => {
			const result = Effect.runSync(
				Effect.flatMap(enclose(payload), unwrap).pipe(
					Effect.provide(Clock.Fixed(new Timestamp({ nanos: 500, seconds: 1_700_000_000 }))),
				),
			)

			expect(Array.from(result.payload)).toStrictEqual(Array.from(payload))
			expect(result.enclosedAt.nanos).toBe(500)
		})

		it.effect('fails with MalformedEnvelope on corrupted input', () =>
			Effect.gen(function* () {
				const message = yield* enclose(text('test'))
				const error = yield* Effect.flip(unwrap(message.slice(0, message.length - 2)))

				expect(error._tag).toBe('MalformedEnvelope')
				expect(error.reason).toBe('wire')
			}).pipe(Effect.provide(Clock.Test)),
		)

		it.live('receives no earlier than it encloses on the live clock', () =>
			Effect.gen(function* () {
				const result = yield* unwrap(yield* enclose(text('test')))

				expect(new TextDecoder().decode(result.payload)).toBe('test')
				expect(Timestamp.lessThanOrEqualTo(result.enclosedAt, result.receivedAt)).toBe(true)
			}).pipe(Effect.provide(Clock.Live)),
		)
	})

	describe('sync entry points', () => {
		it('round-trips without an Effect runtime', () => {
			const result = Either.getOrThrow(unwrapSync(encloseSync(text('test'))))

			expect(new TextDecoder().decode(result.payload)).toBe('test')
			expect(Timestamp.lessThanOrEqualTo(result.enclosedAt, result.receivedAt)).toBe(true)
		})

		it('returns MalformedEnvelope as a Left', () => {
			const error = Either.getOrThrow(Either.flip(unwrapSync(new Uint8Array([0xff]))))

			expect(error.reason).toBe('wire')
		})
	})
})
