/**
 * Envelope Schema
 *
 * The unit of transport: a creation timestamp paired with an opaque payload. The payload is never interpreted here;
 * selecting a decoder for it is the job of the tag registry and the payload codecs.
 *
 * Wire representation is the protobuf message `letterbox.Envelope` (see `proto/letterbox/envelope.proto`):
 *
 * - `enclosed_at` - field 1, `google.protobuf.Timestamp`
 * - `payload` - field 2, `bytes`
 *
 * The envelope package maps between this schema and the wire; this module only owns the structural contract.
 */

import * as Schema from 'effect/Schema'

import { Timestamp } from '../shared/index.ts'

export class Envelope extends Schema.Class<Envelope>('Envelope')({
	/** When the payload was sealed */
	enclosedAt: Timestamp,

	/** Caller-supplied bytes, possibly empty */
	payload: Schema.Uint8ArrayFromSelf,
}) {}

export declare namespace Envelope {
	type Type = typeof Envelope.Type

	/**
	 * Plain object shape accepted by the decoder (what protobufjs `toObject` produces)
	 */
	type Encoded = typeof Envelope.Encoded
}

/**
 * MalformedEnvelope - Input bytes do not form a valid envelope record
 *
 * - `wire`: the protobuf reader rejected the bytes (truncated length-delimited field, bad varint, ...)
 * - `structure`: the bytes parsed but the record is incomplete or out of range (missing `enclosed_at`, `nanos`
 *   outside `[0, 1e9)`, ...)
 *
 * Never recovered by substituting defaults; retrying the same bytes cannot succeed.
 */
export class MalformedEnvelope extends Schema.TaggedError<MalformedEnvelope>()('MalformedEnvelope', {
	message: Schema.String,
	reason: Schema.Literal('wire', 'structure'),
}) {}
