/**
 * Payload codecs
 *
 * The envelope never looks inside its payload. These helpers are for consumers that do: given a fully-qualified type
 * name (usually resolved from a tag through the `TagRegistry`), encode plain field objects to protobuf bytes and back.
 *
 * Field objects use protobufjs' plain-object conventions: camelCase field names, `google.protobuf.Timestamp` as
 * `{ seconds, nanos }`, 64-bit integers as numbers, and `bytes` as `Uint8Array` (or base64 strings on input).
 */

import * as Either from 'effect/Either'
import { pipe } from 'effect/Function'
import * as Schema from 'effect/Schema'
import type { IConversionOptions } from 'protobufjs'

import { lookupMessageType, type UnknownMessageType } from '@letterbox/schemas/proto'

/**
 * PayloadError - The fields do not fit the message type, or the bytes do not decode as it
 */
export class PayloadError extends Schema.TaggedError<PayloadError>()('PayloadError', {
	message: Schema.String,
	typeName: Schema.String,
}) {}

export type PayloadFields = Readonly<Record<string, unknown>>

const toObjectOptions: IConversionOptions = { defaults: true, longs: Number }

export const encodePayload = (
	typeName: string,
	fields: PayloadFields,
): Either.Either<Uint8Array, PayloadError | UnknownMessageType> =>
	Either.flatMap(lookupMessageType(typeName), type => {
		const invalid = type.verify(fields)
		if (invalid !== null) {
			return Either.left(new PayloadError({ message: invalid, typeName }))
		}
		return Either.try({
			catch: cause => new PayloadError({ message: cause instanceof Error ? cause.message : String(cause), typeName }),
			try: () => Uint8Array.from(type.encode(type.fromObject(fields)).finish()),
		})
	})

export const decodePayload = (
	typeName: string,
	bytes: Uint8Array,
	options: IConversionOptions = toObjectOptions,
): Either.Either<Record<string, unknown>, PayloadError | UnknownMessageType> =>
	Either.flatMap(lookupMessageType(typeName), type =>
		Either.try({
			catch: cause => new PayloadError({ message: cause instanceof Error ? cause.message : String(cause), typeName }),
			try: (): Record<string, unknown> => type.toObject(type.decode(bytes), options),
		}),
	)

const JsonFields = Schema.parseJson(Schema.Record({ key: Schema.String, value: Schema.Unknown }))

/** Parse a JSON object into payload fields; arrays and scalars are rejected */
export const fieldsFromJson = (typeName: string, json: string): Either.Either<PayloadFields, PayloadError> =>
	pipe(
		Schema.decodeUnknownEither(JsonFields)(json),
		Either.mapLeft(error => new PayloadError({ message: error.message, typeName })),
	)
