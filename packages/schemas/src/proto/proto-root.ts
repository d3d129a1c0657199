/**
 * Protobuf root for the bundled `.proto` definitions
 *
 * Definitions are parsed once, at module load, from `packages/schemas/proto/`. Imports of
 * `google/protobuf/*.proto` resolve to the well-known types protobufjs ships with, so no extra files are needed for
 * `google.protobuf.Timestamp`.
 */

import * as Platform from '@effect/platform'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Schema from 'effect/Schema'
import protobuf from 'protobufjs'
import type { Root, Type } from 'protobufjs'

const PROTO_FILES = ['letterbox/envelope.proto', 'letterbox/primitives.proto'] as const

/**
 * Absolute paths of the bundled `.proto` files, resolved against this module's URL
 */
export const protoFilePaths: Effect.Effect<ReadonlyArray<string>, Platform.Error.BadArgument, Platform.Path.Path> =
	Effect.gen(function* () {
		const path = yield* Platform.Path.Path
		const protoDirectory = yield* path.fromFileUrl(new URL('../../proto/', import.meta.url))

		return PROTO_FILES.map(file => path.join(protoDirectory, file))
	})

export const ProtoRoot: Root = new protobuf.Root().loadSync([
	...Effect.runSync(protoFilePaths.pipe(Effect.provide(Platform.Path.layer))),
])

/**
 * UnknownMessageType - No message definition with this fully-qualified name was loaded
 */
export class UnknownMessageType extends Schema.TaggedError<UnknownMessageType>()('UnknownMessageType', {
	typeName: Schema.String,
}) {}

/**
 * Resolve a fully-qualified name (e.g. `letterbox.TimestampedFloat`) to its reflected message type
 *
 * Enums, services and namespaces with the same name are not message types and resolve to `UnknownMessageType`.
 */
export const lookupMessageType = (typeName: string): Either.Either<Type, UnknownMessageType> => {
	const found = ProtoRoot.lookup(typeName)
	return found instanceof protobuf.Type ? Either.right(found) : Either.left(new UnknownMessageType({ typeName }))
}
