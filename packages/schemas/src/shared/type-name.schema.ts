/**
 * TypeName - Fully-qualified protobuf message name
 *
 * Examples: "letterbox.TimestampedFloat", "foxglove.LocationFix"
 *
 * At least one package segment is required; a bare "TimestampedFloat" is rejected so that registry entries are never
 * ambiguous across packages.
 */

import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

export class TypeName extends Schema.String.pipe(
	Schema.pattern(/^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)+$/, {
		description: 'Fully-qualified message type name',
		message: () => 'Invalid type name. Expected a dot-qualified identifier such as "package.Message"',
		title: 'TypeName',
	}),
	Schema.brand('TypeName'),
) {
	static readonly decodeEither: (value: string) => Either.Either<TypeName.Type, ParseResult.ParseError> = value =>
		Schema.decodeEither(TypeName)(value)
}

export declare namespace TypeName {
	type Type = typeof TypeName.Type
}
