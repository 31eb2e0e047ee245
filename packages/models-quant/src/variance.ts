import { InvalidInputError } from "./errors";

/**
 * Population variance (divisor = count), accumulated with Welford's update.
 * A single value has no deviation, so its variance is 0; so does a constant
 * series, exactly.
 */
export function sampleVariance(values: readonly number[]): number {
	if (!values.length) {
		throw new InvalidInputError("Cannot compute variance of an empty series");
	}

	let mean = 0;
	let m2 = 0;
	for (let i = 0; i < values.length; i += 1) {
		const value = values[i];
		if (!Number.isFinite(value)) {
			throw new InvalidInputError(
				`Series value at index ${i} is not a finite number: ${value}`,
				i
			);
		}
		const delta = value - mean;
		mean += delta / (i + 1);
		m2 += delta * (value - mean);
	}

	const variance = m2 / values.length;
	if (!Number.isFinite(variance)) {
		throw new InvalidInputError(
			"Series variance is not finite: values are too far apart to square"
		);
	}
	return variance;
}
