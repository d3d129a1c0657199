/**
 * Envelope Codec
 *
 * `enclose` seals a payload with the current time and returns the wire bytes; `unwrap` reads the clock on arrival,
 * decodes the bytes and hands back both instants with the untouched payload.
 *
 * The clock is the only dependency (`ClockPort`). Production wiring uses `Clock.Live`; tests swap in `Clock.Test` or
 * `Clock.Fixed` to pin `enclosedAt`/`receivedAt`.
 */

import * as Data from 'effect/Data'
import * as Effect from 'effect/Effect'
import type * as Either from 'effect/Either'

import { Clock } from '@letterbox/platform/adapters'
import { ClockPort } from '@letterbox/platform/ports'
import { Envelope, type MalformedEnvelope } from '@letterbox/schemas/envelope'
import { Timestamp } from '@letterbox/schemas/shared'

import { decodeEnvelope, encodeEnvelope } from '../wire/index.ts'

export interface UnwrapResult {
	/** When `unwrap` was called, read before decoding */
	readonly receivedAt: Timestamp
	/** When the sender sealed the envelope */
	readonly enclosedAt: Timestamp
	readonly payload: Uint8Array
}

export interface EncloseOptions {
	/** Seal with this instant instead of the current time; must not be later than the clock */
	readonly enclosedAt?: Timestamp
}

/**
 * EnclosedAtInFuture - An explicit `enclosedAt` is later than the clock at enclose time
 *
 * Raised as a defect: the caller passed an instant that cannot have happened yet.
 */
export class EnclosedAtInFuture extends Data.TaggedError('EnclosedAtInFuture')<{
	readonly enclosedAt: Timestamp
	readonly now: Timestamp
}> {}

/**
 * Seal `payload` in an envelope stamped with the current time
 *
 * @example
 *
 * ```typescript
 * import * as Effect from "effect/Effect"
 * import { Clock } from "@letterbox/platform/adapters"
 *
 * const bytes = enclose(new TextEncoder().encode("test")).pipe(Effect.provide(Clock.Live), Effect.runSync)
 * ```
 */
export const enclose = (payload: Uint8Array, options?: EncloseOptions): Effect.Effect<Uint8Array, never, ClockPort> =>
	Effect.gen(function* () {
		const now = yield* (yield* ClockPort).now()
		const enclosedAt = options?.enclosedAt ?? now

		if (Timestamp.greaterThan(enclosedAt, now)) {
			return yield* Effect.die(new EnclosedAtInFuture({ enclosedAt, now }))
		}
		return encodeEnvelope(new Envelope({ enclosedAt, payload }))
	})

/**
 * Read the clock, then decode `message`
 *
 * `receivedAt >= enclosedAt` holds when both sides share a clock but is not checked: envelopes from a peer with a
 * skewed clock still unwrap.
 */
export const unwrap = (message: Uint8Array): Effect.Effect<UnwrapResult, MalformedEnvelope, ClockPort> =>
	Effect.gen(function* () {
		const receivedAt = yield* (yield* ClockPort).now()
		const envelope = yield* decodeEnvelope(message)
		return { enclosedAt: envelope.enclosedAt, payload: envelope.payload, receivedAt }
	})

/** `enclose` on the live clock, for callers outside Effect */
export const encloseSync = (payload: Uint8Array, options?: EncloseOptions): Uint8Array =>
	enclose(payload, options).pipe(Effect.provide(Clock.Live), Effect.runSync)

/** `unwrap` on the live clock, for callers outside Effect */
export const unwrapSync = (message: Uint8Array): Either.Either<UnwrapResult, MalformedEnvelope> =>
	unwrap(message).pipe(Effect.either, Effect.provide(Clock.Live), Effect.runSync)
