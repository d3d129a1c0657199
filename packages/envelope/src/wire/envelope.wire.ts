/**
 * Envelope wire codec
 *
 * Maps `Envelope` to and from the protobuf record `letterbox.Envelope`:
 *
 * - field 1 `enclosed_at`: length-delimited `google.protobuf.Timestamp { int64 seconds = 1; int32 nanos = 2; }`
 * - field 2 `payload`: length-delimited bytes
 *
 * Unknown fields are skipped on read. Known fields must carry their declared wire type, checked before the
 * protobuf decoder runs since it dispatches on field numbers alone. A record without `enclosed_at` is rejected, never
 * read back as the epoch.
 */

import * as Either from 'effect/Either'
import { pipe } from 'effect/Function'
import * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'
import protobuf from 'protobufjs'
import type { Reader } from 'protobufjs'

import { Envelope, MalformedEnvelope } from '@letterbox/schemas/envelope'
import { lookupMessageType } from '@letterbox/schemas/proto'

const EnvelopeMessage = Either.getOrThrow(lookupMessageType('letterbox.Envelope'))

const decodeStructure = Schema.decodeUnknownEither(Envelope)

const VARINT = 0
const LENGTH_DELIMITED = 2

const ENCLOSED_AT = 1

/** Field number to wire type, per record */
const ENVELOPE_WIRE_TYPES: ReadonlyMap<number, number> = new Map([
	[ENCLOSED_AT, LENGTH_DELIMITED],
	[2, LENGTH_DELIMITED],
])
const TIMESTAMP_WIRE_TYPES: ReadonlyMap<number, number> = new Map([
	[1, VARINT],
	[2, VARINT],
])

const readTag = (reader: Reader, record: string, wireTypes: ReadonlyMap<number, number>) => {
	const tag = reader.uint32()
	const field = tag >>> 3
	const wireType = tag & 7
	const expected = wireTypes.get(field)

	if (field === 0) {
		throw new Error(`${record}: field number 0 at offset ${reader.pos}`)
	}
	if (expected !== undefined && expected !== wireType) {
		throw new Error(`${record}: field ${field} has wire type ${wireType}, expected ${expected}`)
	}
	return { field, wireType }
}

/** Throws on a known field with the wrong wire type, or on bytes the reader cannot walk */
const checkWireTypes = (bytes: Uint8Array): void => {
	const reader = protobuf.Reader.create(bytes)
	while (reader.pos < reader.len) {
		const { field, wireType } = readTag(reader, 'Envelope', ENVELOPE_WIRE_TYPES)
		if (field === ENCLOSED_AT) {
			const timestamp = protobuf.Reader.create(reader.bytes())
			while (timestamp.pos < timestamp.len) {
				timestamp.skipType(readTag(timestamp, 'Timestamp', TIMESTAMP_WIRE_TYPES).wireType)
			}
		} else {
			reader.skipType(wireType)
		}
	}
}

export const encodeEnvelope = (envelope: Envelope): Uint8Array => {
	const message = EnvelopeMessage.fromObject({
		enclosedAt: { nanos: envelope.enclosedAt.nanos, seconds: envelope.enclosedAt.seconds },
		payload: envelope.payload,
	})
	// finish() yields a Buffer under Node
	return Uint8Array.from(EnvelopeMessage.encode(message).finish())
}

export const decodeEnvelope = (bytes: Uint8Array): Either.Either<Envelope, MalformedEnvelope> =>
	pipe(
		Either.try({
			catch: cause =>
				new MalformedEnvelope({
					message: cause instanceof Error ? cause.message : String(cause),
					reason: 'wire',
				}),
			try: () => {
				checkWireTypes(bytes)
				return EnvelopeMessage.toObject(EnvelopeMessage.decode(bytes), { defaults: true, longs: Number })
			},
		}),
		Either.flatMap(plain =>
			Either.mapLeft(
				decodeStructure({ enclosedAt: plain['enclosedAt'], payload: Uint8Array.from(plain['payload'] ?? []) }),
				error =>
					new MalformedEnvelope({
						message: ParseResult.TreeFormatter.formatErrorSync(error),
						reason: 'structure',
					}),
			),
		),
	)
