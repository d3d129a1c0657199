/**
 * TagRegistry - Tag to message type resolution
 *
 * Maps short subject tags (`temperature_celsius`) to the fully-qualified type name of the payload they carry
 * (`letterbox.TimestampedFloat`). A generic consumer that learns the tag out-of-band (typically from the key
 * expression) uses it to pick the payload decoder after unwrapping an envelope.
 *
 * The registry is a value, not ambient state:
 *
 * - Built once by `TagRegistry.make` from a complete table and never mutated afterwards
 * - Shared through the `TagRegistry` context tag, so every consumer sees the same instance
 * - `TagRegistry.Default` wraps the bundled table (`tag-table.json`), decoded and validated at module load
 *
 * Lookups never invent entries: an unknown tag is an `UnknownTag` failure, not a placeholder type name.
 */

import * as Arr from 'effect/Array'
import * as Context from 'effect/Context'
import * as Either from 'effect/Either'
import * as HashMap from 'effect/HashMap'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'
import * as StringModule from 'effect/String'

import { MessageTag, TypeName } from '../shared/index.ts'
import BundledTagTable from './tag-table.json'

/**
 * UnknownTag - The tag has no entry in the registry
 */
export class UnknownTag extends Schema.TaggedError<UnknownTag>()('UnknownTag', {
	tag: Schema.String,
}) {}

/**
 * TagTable - Association of tags to type names, as stored in `tag-table.json`
 *
 * A key that is not a valid tag fails the decode instead of being dropped as an excess property.
 */
export const TagTable = Schema.Record({ key: MessageTag, value: TypeName }).annotations({
	parseOptions: { onExcessProperty: 'error' },
})

export declare namespace TagTable {
	type Type = typeof TagTable.Type
	type Encoded = typeof TagTable.Encoded
}

export class TagRegistry extends Context.Tag('@letterbox/schemas/tags/TagRegistry')<
	TagRegistry,
	{
		/**
		 * Resolve a tag to its type name, returned verbatim
		 *
		 * @example
		 *
		 * ```typescript
		 * import * as Effect from "effect/Effect"
		 *
		 * const typeName = Effect.gen(function* () {
		 *   const registry = yield* TagRegistry
		 *   return yield* registry.resolve("temperature_celsius")
		 * })
		 * // Effect<TypeName.Type, UnknownTag, TagRegistry>
		 * ```
		 */
		readonly resolve: (tag: string) => Either.Either<TypeName.Type, UnknownTag>

		/** Whether `resolve(tag)` would succeed */
		readonly isWellKnown: (tag: string) => boolean

		/** Every registered tag, sorted */
		readonly tags: ReadonlyArray<string>

		/** The backing table */
		readonly entries: HashMap.HashMap<string, TypeName.Type>
	}
>() {
	/**
	 * Build a registry from a complete, already validated table
	 *
	 * The table is copied; later changes to the argument do not reach the registry.
	 */
	static readonly make = (table: TagTable.Type): TagRegistry.Service => {
		const entries = HashMap.fromIterable(Object.entries(table))
		const tags = Arr.sort(HashMap.keys(entries), StringModule.Order)

		return TagRegistry.of({
			entries,
			isWellKnown: tag => HashMap.has(entries, tag),
			resolve: tag =>
				Option.match(HashMap.get(entries, tag), {
					onNone: () => Either.left(new UnknownTag({ tag })),
					onSome: typeName => Either.right(typeName),
				}),
			tags,
		})
	}

	/**
	 * The compiled-in table; malformed entries fail module initialization
	 */
	static readonly bundled: TagTable.Type = Schema.decodeUnknownSync(TagTable, { onExcessProperty: 'error' })(
		BundledTagTable,
	)

	static readonly Default: Layer.Layer<TagRegistry> = Layer.succeed(TagRegistry, TagRegistry.make(TagRegistry.bundled))
}

export declare namespace TagRegistry {
	type Service = Context.Tag.Service<TagRegistry>
}
