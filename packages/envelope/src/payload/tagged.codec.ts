/**
 * Tag-driven enclose/unwrap
 *
 * Joins the three lookups a generic producer or consumer needs: tag → type name (`TagRegistry`), type name → message
 * type (`ProtoRoot`), and the envelope itself. The key-based variants take the tag from a pub/sub key expression, so a
 * bridge that only sees `(key, bytes)` pairs can translate to and from JSON.
 */

import * as Effect from 'effect/Effect'
import * as Encoding from 'effect/Encoding'

import { ClockPort } from '@letterbox/platform/ports'
import { type KeyParseError, subjectFromPubSubKey } from '@letterbox/platform/routing'
import type { MalformedEnvelope } from '@letterbox/schemas/envelope'
import type { UnknownMessageType } from '@letterbox/schemas/proto'
import type { Timestamp, TypeName } from '@letterbox/schemas/shared'
import { TagRegistry, type UnknownTag } from '@letterbox/schemas/tags'

import { enclose, unwrap } from '../codec/index.ts'
import { decodePayload, encodePayload, fieldsFromJson, PayloadError, type PayloadFields } from './payload.codec.ts'

export interface TaggedUnwrapResult {
	readonly receivedAt: Timestamp
	readonly enclosedAt: Timestamp
	readonly tag: string
	readonly typeName: TypeName.Type
	readonly value: Record<string, unknown>
}

const resolveTag = (tag: string): Effect.Effect<TypeName.Type, UnknownTag, TagRegistry> =>
	Effect.gen(function* () {
		const registry = yield* TagRegistry
		return yield* registry.resolve(tag)
	})

/**
 * Encode `fields` as the payload type registered for `tag`, then enclose
 *
 * @example
 *
 * ```typescript
 * encloseTagged("temperature_celsius", { timestamp: { seconds: 1_700_000_000, nanos: 0 }, value: 21.5 })
 * // Effect<Uint8Array, UnknownTag | UnknownMessageType | PayloadError, TagRegistry | ClockPort>
 * ```
 */
export const encloseTagged = (
	tag: string,
	fields: PayloadFields,
): Effect.Effect<Uint8Array, UnknownTag | UnknownMessageType | PayloadError, TagRegistry | ClockPort> =>
	Effect.gen(function* () {
		const typeName = yield* resolveTag(tag)
		const payload = yield* encodePayload(typeName, fields)
		return yield* enclose(payload)
	})

export const unwrapTagged = (
	tag: string,
	message: Uint8Array,
): Effect.Effect<
	TaggedUnwrapResult,
	UnknownTag | MalformedEnvelope | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> =>
	Effect.gen(function* () {
		const typeName = yield* resolveTag(tag)
		const { enclosedAt, payload, receivedAt } = yield* unwrap(message)
		const value = yield* decodePayload(typeName, payload)
		return { enclosedAt, receivedAt, tag, typeName, value }
	})

/**
 * Enclose a JSON object under the payload type of the key's subject
 */
export const encloseFromJson = (
	key: string,
	json: string,
): Effect.Effect<
	Uint8Array,
	KeyParseError | UnknownTag | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> =>
	Effect.gen(function* () {
		const tag = yield* subjectFromPubSubKey(key)
		const typeName = yield* resolveTag(tag)
		const fields = yield* fieldsFromJson(typeName, json)
		return yield* encloseTagged(tag, fields)
	})

/**
 * Unwrap and render the payload as JSON
 *
 * Field names are camelCase. Scalars are always present (defaults included), unset message fields are `null`,
 * timestamps are `{ seconds, nanos }` objects and `bytes` fields are base64.
 */
export const unwrapToJson = (
	key: string,
	message: Uint8Array,
): Effect.Effect<
	string,
	KeyParseError | UnknownTag | MalformedEnvelope | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> =>
	Effect.gen(function* () {
		const tag = yield* subjectFromPubSubKey(key)
		const typeName = yield* resolveTag(tag)
		const { payload } = yield* unwrap(message)
		const value = yield* decodePayload(typeName, payload, { bytes: String, defaults: true, longs: Number })
		return JSON.stringify(value)
	})

/** Only the `raw` subject carries text and base64, as `TimestampedBytes` */
const RAW = 'raw'
const RAW_TYPE_NAME = 'letterbox.TimestampedBytes'

const requireRaw = (key: string): Effect.Effect<string, KeyParseError | PayloadError> =>
	Effect.gen(function* () {
		const subject = yield* subjectFromPubSubKey(key)
		if (subject !== RAW) {
			return yield* new PayloadError({
				message: `raw payloads are only carried by the '${RAW}' subject, got '${subject}'`,
				typeName: RAW_TYPE_NAME,
			})
		}
		return subject
	})

/** Stamp `bytes` with the current time as a `TimestampedBytes` and enclose it under a `raw` key */
const encloseRaw = (
	key: string,
	bytes: Uint8Array,
): Effect.Effect<
	Uint8Array,
	KeyParseError | UnknownTag | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> =>
	Effect.gen(function* () {
		const tag = yield* requireRaw(key)
		const clock = yield* ClockPort
		const now = yield* clock.now()
		return yield* encloseTagged(tag, {
			timestamp: { nanos: now.nanos, seconds: now.seconds },
			value: bytes,
		})
	})

const unwrapRaw = (
	key: string,
	message: Uint8Array,
): Effect.Effect<
	Uint8Array,
	KeyParseError | UnknownTag | MalformedEnvelope | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> =>
	Effect.gen(function* () {
		const tag = yield* requireRaw(key)
		const { typeName, value } = yield* unwrapTagged(tag, message)
		const bytes = value['value']
		if (!(bytes instanceof Uint8Array)) {
			return yield* new PayloadError({ message: `'value' is not a bytes field of ${typeName}`, typeName })
		}
		return bytes
	})

/** Enclose UTF-8 text under a `raw` key */
export const encloseFromText = (
	key: string,
	text: string,
): Effect.Effect<
	Uint8Array,
	KeyParseError | UnknownTag | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> => encloseRaw(key, new TextEncoder().encode(text))

export const unwrapToText = (
	key: string,
	message: Uint8Array,
): Effect.Effect<
	string,
	KeyParseError | UnknownTag | MalformedEnvelope | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> => Effect.map(unwrapRaw(key, message), bytes => new TextDecoder().decode(bytes))

/** Enclose base64-encoded bytes under a `raw` key */
export const encloseFromBase64 = (
	key: string,
	base64: string,
): Effect.Effect<
	Uint8Array,
	KeyParseError | UnknownTag | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> =>
	Effect.gen(function* () {
		const bytes = yield* Effect.mapError(
			Encoding.decodeBase64(base64),
			error => new PayloadError({ message: error.message ?? 'invalid base64', typeName: RAW_TYPE_NAME }),
		)
		return yield* encloseRaw(key, bytes)
	})

export const unwrapToBase64 = (
	key: string,
	message: Uint8Array,
): Effect.Effect<
	string,
	KeyParseError | UnknownTag | MalformedEnvelope | UnknownMessageType | PayloadError,
	TagRegistry | ClockPort
> => Effect.map(unwrapRaw(key, message), Encoding.encodeBase64)
