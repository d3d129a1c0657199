/**
 * Timestamp - Structured point in time
 *
 * Mirrors the `google.protobuf.Timestamp` shape: whole seconds since the Unix epoch plus a non-negative nanosecond
 * fraction. Kept structured (rather than a single integer counter) so values stay comparable and readable across
 * producers written against other protobuf runtimes.
 *
 * Ordering is lexicographic on `(seconds, nanos)`. Because `nanos` is always normalized into `[0, 1e9)`, this matches
 * chronological order, including for instants before 1970.
 *
 * Resolution is one nanosecond; `DateTime` conversions truncate to milliseconds.
 */

import * as DateTime from 'effect/DateTime'
import type * as Either from 'effect/Either'
import * as Order from 'effect/Order'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

const NANOS_PER_SECOND = 1_000_000_000n
const NANOS_PER_MILLI = 1_000_000n

/** 0001-01-01T00:00:00Z */
const MIN_SECONDS = -62_135_596_800
/** 9999-12-31T23:59:59Z */
const MAX_SECONDS = 253_402_300_799

export class Timestamp extends Schema.Class<Timestamp>('Timestamp')({
	/** Whole seconds since 1970-01-01T00:00:00Z */
	seconds: Schema.Int.pipe(Schema.between(MIN_SECONDS, MAX_SECONDS)),
	/** Sub-second fraction, always non-negative */
	nanos: Schema.Int.pipe(Schema.between(0, 999_999_999)),
}) {
	/**
	 * Build from nanoseconds since the epoch
	 *
	 * Negative inputs floor toward the earlier second so that `nanos` stays in range: `-1n` becomes
	 * `{ seconds: -1, nanos: 999_999_999 }`.
	 */
	static readonly fromEpochNanos = (epochNanos: bigint): Timestamp => {
		let seconds = epochNanos / NANOS_PER_SECOND
		let nanos = epochNanos % NANOS_PER_SECOND
		if (nanos < 0n) {
			seconds -= 1n
			nanos += NANOS_PER_SECOND
		}
		return new Timestamp({ nanos: Number(nanos), seconds: Number(seconds) })
	}

	static readonly fromEpochMillis = (epochMillis: number): Timestamp =>
		Timestamp.fromEpochNanos(BigInt(Math.floor(epochMillis)) * NANOS_PER_MILLI)

	static readonly fromDateTime = (dateTime: DateTime.Utc): Timestamp =>
		Timestamp.fromEpochMillis(DateTime.toEpochMillis(dateTime))

	/**
	 * Lexicographic order on `(seconds, nanos)`
	 */
	static readonly Order: Order.Order<Timestamp> = Order.combine(
		Order.mapInput(Order.number, (self: Timestamp) => self.seconds),
		Order.mapInput(Order.number, (self: Timestamp) => self.nanos),
	)

	static readonly lessThanOrEqualTo = Order.lessThanOrEqualTo(Timestamp.Order)

	static readonly greaterThanOrEqualTo = Order.greaterThanOrEqualTo(Timestamp.Order)

	static readonly greaterThan = Order.greaterThan(Timestamp.Order)

	static readonly Equivalence = (self: Timestamp, that: Timestamp): boolean => Timestamp.Order(self, that) === 0

	static readonly decodeEither: (value: unknown) => Either.Either<Timestamp, ParseResult.ParseError> =
		Schema.decodeUnknownEither(Timestamp)

	toEpochNanos(): bigint {
		return BigInt(this.seconds) * NANOS_PER_SECOND + BigInt(this.nanos)
	}

	/** Millisecond view of this instant (sub-millisecond digits are dropped) */
	toDateTime(): DateTime.Utc {
		return DateTime.unsafeMake(Number(this.toEpochNanos() / NANOS_PER_MILLI))
	}
}

export declare namespace Timestamp {
	/**
	 * Wire shape: `{ seconds, nanos }` as plain numbers
	 */
	type Encoded = typeof Timestamp.Encoded
}
