import * as Schema from 'effect/Schema'

/**
 * MessageTag - Short subject identifier used as a registry key
 *
 * Lower snake case, e.g. `raw`, `temperature_celsius`. Tags travel inside key expressions, so `/` and `@` are not
 * allowed.
 */
export const MessageTag = Schema.String.pipe(
	Schema.pattern(/^[a-z][a-z0-9_]*$/, {
		description: 'Lower snake case subject tag',
		message: () => 'Invalid tag. Expected lower snake case, e.g. "temperature_celsius"',
		title: 'MessageTag',
	}),
)
