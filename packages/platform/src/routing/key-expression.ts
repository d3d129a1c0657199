/**
 * Key expressions
 *
 * Envelopes travel under hierarchical keys that carry the subject tag, so a generic consumer can pick the payload
 * decoder from the key alone (tag → TagRegistry → type name → decoder).
 *
 * Formats:
 *
 * - Publish/subscribe: `{basePath}/@v0/{entityId}/pubsub/{subject}/{sourceId}[/@target/{targetId}]`
 * - Request/reply: `{basePath}/@v0/{entityId}/@rpc/{procedure}/{responderId}`
 *
 * `sourceId` and `responderId` may themselves contain `/` (e.g. `camera/0`); everything after the fixed prefix belongs
 * to them, up to an optional `@target` marker on pub/sub keys.
 */

import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { TagRegistry } from '@letterbox/schemas/tags'

const VERSION = '@v0'
const PUB_SUB = 'pubsub'
const RPC = '@rpc'
const TARGET = '@target'

/**
 * KeyParseError - The key does not follow the expected format
 */
export class KeyParseError extends Schema.TaggedError<KeyParseError>()('KeyParseError', {
	key: Schema.String,
	message: Schema.String,
}) {}

export interface PubSubKey {
	readonly basePath: string
	readonly entityId: string
	readonly subject: string
	readonly sourceId: string
	readonly targetId: Option.Option<string>
}

export interface RpcKey {
	readonly basePath: string
	readonly entityId: string
	readonly procedure: string
	readonly responderId: string
}

/**
 * Build a publish/subscribe key
 *
 * Subjects missing from the registry are still accepted (custom subjects are legitimate), but logged as a warning
 * since no consumer will be able to resolve their payload type.
 */
export const constructPubSubKey = (parts: {
	readonly basePath: string
	readonly entityId: string
	readonly subject: string
	readonly sourceId: string
	readonly targetId?: string
}): Effect.Effect<string, never, TagRegistry> =>
	Effect.gen(function* () {
		const registry = yield* TagRegistry
		if (!registry.isWellKnown(parts.subject)) {
			yield* Effect.logWarning('Subject is not well-known', { subject: parts.subject })
		}

		const key = [parts.basePath, VERSION, parts.entityId, PUB_SUB, parts.subject, parts.sourceId].join('/')
		return parts.targetId === undefined ? key : `${key}/${TARGET}/${parts.targetId}`
	})

export const constructRpcKey = (parts: RpcKey): string =>
	[parts.basePath, VERSION, parts.entityId, RPC, parts.procedure, parts.responderId].join('/')

const splitPrefix = (
	key: string,
	kind: typeof PUB_SUB | typeof RPC,
): Either.Either<
	{ basePath: string; entityId: string; name: string; rest: ReadonlyArray<string> },
	KeyParseError
> => {
	const [basePath, version, entityId, marker, name, ...rest] = key.split('/')

	if (basePath === undefined || entityId === undefined || name === undefined || rest.length === 0) {
		return Either.left(new KeyParseError({ key, message: 'expected at least 6 "/"-separated segments' }))
	}
	if (version !== VERSION || marker !== kind) {
		return Either.left(
			new KeyParseError({ key, message: `expected "{basePath}/${VERSION}/{entityId}/${kind}/..."` }),
		)
	}
	if (basePath === '' || entityId === '' || name === '') {
		return Either.left(
			new KeyParseError({ key, message: 'base path, entity id and subject/procedure must be non-empty' }),
		)
	}
	return Either.right({ basePath, entityId, name, rest })
}

export const parsePubSubKey = (key: string): Either.Either<PubSubKey, KeyParseError> =>
	Either.flatMap(splitPrefix(key, PUB_SUB), ({ basePath, entityId, name, rest }) => {
		const targetIndex = rest.indexOf(TARGET)
		const source = targetIndex === -1 ? rest : rest.slice(0, targetIndex)
		const target = targetIndex === -1 ? [] : rest.slice(targetIndex + 1)

		if (source.length === 0 || source.join('') === '') {
			return Either.left(new KeyParseError({ key, message: 'missing source id' }))
		}
		if (targetIndex !== -1 && target.join('') === '') {
			return Either.left(new KeyParseError({ key, message: `missing target id after "${TARGET}"` }))
		}

		return Either.right({
			basePath,
			entityId,
			sourceId: source.join('/'),
			subject: name,
			targetId: targetIndex === -1 ? Option.none() : Option.some(target.join('/')),
		})
	})

export const parseRpcKey = (key: string): Either.Either<RpcKey, KeyParseError> =>
	Either.flatMap(splitPrefix(key, RPC), ({ basePath, entityId, name, rest }) =>
		rest.join('') === ''
			? Either.left(new KeyParseError({ key, message: 'missing responder id' }))
			: Either.right({ basePath, entityId, procedure: name, responderId: rest.join('/') }),
	)

export const subjectFromPubSubKey = (key: string): Either.Either<string, KeyParseError> =>
	Either.map(parsePubSubKey(key), ({ subject }) => subject)
