/**
 * Configured TagRegistry layer
 *
 * Builds the registry once, at layer construction, from the bundled table plus optional deployment overrides.
 *
 * Environment variables:
 *
 * - `TAG_REGISTRY_OVERRIDES`: JSON object of `tag → typeName` (e.g. `{"wind_speed_mps":"letterbox.TimestampedFloat"}`).
 *   Entries are added to the bundled table; an entry with a bundled tag replaces it.
 *
 * Missing variable: the bundled table is used as-is. Invalid JSON or entries: layer construction fails with a
 * ConfigError (the registry is never built from a partially valid table).
 *
 * Once built, the registry is immutable for the lifetime of the layer.
 */

import * as Config from 'effect/Config'
import type { ConfigError } from 'effect/ConfigError'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { TagRegistry, TagTable } from '@letterbox/schemas/tags'

export const TagRegistryOverrides: Config.Config<Option.Option<TagTable.Type>> = Config.option(
	Schema.Config('TAG_REGISTRY_OVERRIDES', Schema.parseJson(TagTable)),
)

export const TagRegistryLive: Layer.Layer<TagRegistry, ConfigError> = Layer.effect(
	TagRegistry,
	Effect.gen(function* () {
		const overrides = Option.getOrElse(yield* TagRegistryOverrides, (): TagTable.Type => ({}))
		const replaced = Object.keys(overrides).filter(tag => Object.hasOwn(TagRegistry.bundled, tag))

		if (replaced.length > 0) {
			yield* Effect.logWarning('Overriding bundled tags', { tags: replaced })
		}

		const registry = TagRegistry.make({ ...TagRegistry.bundled, ...overrides })

		yield* Effect.logInfo('Tag registry initialized', {
			overrides: Object.keys(overrides).length,
			tags: registry.tags.length,
		})

		return registry
	}),
)
