import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Layer from 'effect/Layer'
import * as Schema from 'effect/Schema'
import * as TestClock from 'effect/TestClock'

import { Clock } from '@letterbox/platform/adapters'
import { ClockPort } from '@letterbox/platform/ports'
import { Timestamp } from '@letterbox/schemas/shared'
import { TagRegistry, TagTable } from '@letterbox/schemas/tags'

import { enclose, unwrap } from '../codec/index.ts'
import {
	encloseFromBase64,
	encloseFromJson,
	encloseFromText,
	encloseTagged,
	unwrapTagged,
	unwrapToBase64,
	unwrapToJson,
	unwrapToText,
} from './tagged.codec.ts'

const decodeBytes = Schema.decodeUnknownEither(Schema.Uint8ArrayFromSelf)

const TestLayer = Layer.merge(Clock.Test, TagRegistry.Default)
const LiveLayer = Layer.merge(Clock.Live, TagRegistry.Default)

describe('tagged codecs', () => {
	it.live('keeps the inner timestamp no later than enclosedAt and receivedAt', () =>
		Effect.gen(function* () {
			const clock = yield* ClockPort
			const sampledAt = yield* clock.now()

			const message = yield* encloseTagged('temperature_celsius', {
				timestamp: { nanos: sampledAt.nanos, seconds: sampledAt.seconds },
				value: 3.14,
			})
			const result = yield* unwrapTagged('temperature_celsius', message)

			expect(result.typeName).toBe('letterbox.TimestampedFloat')
			expect(result.value['value']).toBe(Math.fround(3.14))

			const inner = Either.getOrThrow(Timestamp.decodeEither(result.value['timestamp']))
			expect(Timestamp.Equivalence(inner, sampledAt)).toBe(true)
			expect(Timestamp.lessThanOrEqualTo(inner, result.enclosedAt)).toBe(true)
			expect(Timestamp.lessThanOrEqualTo(result.enclosedAt, result.receivedAt)).toBe(true)
		}).pipe(Effect.provide(LiveLayer)),
	)

	it.effect('leaves the envelope payload as the encoded message', () =>
		Effect.gen(function* () {
			const message = yield* encloseTagged('uptime_s', { value: 42 })
			const { payload } = yield* unwrap(message)

			expect(Array.from(payload)).toStrictEqual([0x10, 0x2a])
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('fails with UnknownTag for an unregistered tag', () =>
		Effect.gen(function* () {
			const error = yield* Effect.flip(encloseTagged('not_registered', { value: 1 }))

			expect(error._tag).toBe('UnknownTag')
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('fails with PayloadError when the payload is not the registered type', () =>
		Effect.gen(function* () {
			const message = yield* enclose(new Uint8Array([0xff]))
			const error = yield* Effect.flip(unwrapTagged('uptime_s', message))

			expect(error._tag).toBe('PayloadError')
		}).pipe(Effect.provide(TestLayer)),
	)

	describe('JSON', () => {
		const key = 'lab/@v0/rig/pubsub/heartbeat/sensor/0'

		it.effect('encloses a JSON object and renders it back with defaults', () =>
			Effect.gen(function* () {
				const message = yield* encloseFromJson(key, '{"value":true}')

				expect(yield* unwrapToJson(key, message)).toBe('{"timestamp":null,"value":true}')
			}).pipe(Effect.provide(TestLayer)),
		)

		it.effect('renders bytes fields as base64', () =>
			Effect.gen(function* () {
				const rawKey = 'lab/@v0/rig/pubsub/raw/sensor'
				const message = yield* encloseFromJson(rawKey, '{"value":"AQID"}')

				expect(yield* unwrapToJson(rawKey, message)).toBe('{"timestamp":null,"value":"AQID"}')
			}).pipe(Effect.provide(TestLayer)),
		)

		it.effect('fails on a key that is not a pub/sub key', () =>
			Effect.gen(function* () {
				const error = yield* Effect.flip(encloseFromJson('lab/@v0/rig/@rpc/reboot/sensor', '{}'))

				expect(error._tag).toBe('KeyParseError')
			}).pipe(Effect.provide(TestLayer)),
		)

		it.effect('fails on a subject missing from the registry', () =>
			Effect.gen(function* () {
				const error = yield* Effect.flip(encloseFromJson('lab/@v0/rig/pubsub/custom_thing/sensor', '{}'))

				expect(error).toMatchObject({ _tag: 'UnknownTag', tag: 'custom_thing' })
			}).pipe(Effect.provide(TestLayer)),
		)
	})

	describe('text', () => {
		const rawKey = 'lab/@v0/rig/pubsub/raw/console'

		it.effect('round-trips UTF-8 text under the raw subject', () =>
			Effect.gen(function* () {
				yield* TestClock.setTime(5_000)
				const message = yield* encloseFromText(rawKey, 'héllo')
				const result = yield* unwrapTagged('raw', message)

				expect(yield* unwrapToText(rawKey, message)).toBe('héllo')
				expect(result.value['timestamp']).toEqual({ nanos: 0, seconds: 5 })
			}).pipe(Effect.provide(TestLayer)),
		)

		it.effect('refuses subjects other than raw', () =>
			Effect.gen(function* () {
				const error = yield* Effect.flip(encloseFromText('lab/@v0/rig/pubsub/log_message/console', 'x'))

				expect(error._tag).toBe('PayloadError')
			}).pipe(Effect.provide(TestLayer)),
		)
	})

	describe('base64', () => {
		const rawKey = 'lab/@v0/rig/pubsub/raw/modem'

		it.effect('round-trips bytes given as base64', () =>
			Effect.gen(function* () {
				const message = yield* encloseFromBase64(rawKey, 'AQID')
				const result = yield* unwrapTagged('raw', message)

				expect(yield* unwrapToBase64(rawKey, message)).toBe('AQID')
				expect(Array.from(Either.getOrThrow(decodeBytes(result.value['value'])))).toStrictEqual([1, 2, 3])
			}).pipe(Effect.provide(TestLayer)),
		)

		it.effect('fails with PayloadError on text that is not base64', () =>
			Effect.gen(function* () {
				const error = yield* Effect.flip(encloseFromBase64(rawKey, 'not base64!'))

				expect(error).toMatchObject({ _tag: 'PayloadError', typeName: 'letterbox.TimestampedBytes' })
			}).pipe(Effect.provide(TestLayer)),
		)

		it.effect('refuses subjects other than raw', () =>
			Effect.gen(function* () {
				const error = yield* Effect.flip(unwrapToBase64('lab/@v0/rig/pubsub/log_message/modem', new Uint8Array()))

				expect(error._tag).toBe('PayloadError')
			}).pipe(Effect.provide(TestLayer)),
		)
	})

	describe('raw subject mapped to a non-bytes type', () => {
		const StringRawLayer = Layer.merge(
			Clock.Test,
			Layer.succeed(
				TagRegistry,
				TagRegistry.make(Schema.decodeUnknownSync(TagTable)({ raw: 'letterbox.TimestampedString' })),
			),
		)

		it.effect('fails instead of returning empty text', () =>
			Effect.gen(function* () {
				const message = yield* encloseTagged('raw', { value: 'not bytes' })
				const error = yield* Effect.flip(unwrapToText('lab/@v0/rig/pubsub/raw/console', message))

				expect(error).toMatchObject({ _tag: 'PayloadError', typeName: 'letterbox.TimestampedString' })
			}).pipe(Effect.provide(StringRawLayer)),
		)
	})
})
