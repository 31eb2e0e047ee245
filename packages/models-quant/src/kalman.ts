import { InvalidInputError, UndefinedGainError } from "./errors";
import { sampleVariance } from "./variance";

/**
 * One step of the scalar filter. `observed` echoes the input element the
 * state was built from; `estimate` doubles as the forecast for the next
 * element.
 */
export interface FilterState {
	readonly observed: number;
	readonly estimate: number;
	readonly errorVariance: number;
}

/**
 * What to do when `R + pPred` is zero:
 * - "zero": use a gain of 0, keeping the estimate and a variance of 0
 * - "throw": raise UndefinedGainError
 */
export type UndefinedGainPolicy = "zero" | "throw";

export interface KalmanUpdateOptions {
	undefinedGainPolicy?: UndefinedGainPolicy;
	/** Index of the observation being folded in, for error reporting. */
	step?: number;
}

export interface KalmanRunOptions {
	undefinedGainPolicy?: UndefinedGainPolicy;
}

export interface FilterRun {
	/** Variance of the whole input, used as both process and measurement noise. */
	noise: number;
	states: FilterState[];
	/** Steps that fell back on the undefined-gain policy. */
	undefinedGainSteps: number;
}

export const createInitialState = (
	first: number,
	noise: number
): FilterState => ({
	observed: first,
	estimate: first,
	errorVariance: noise,
});

// Q is pinned to R: the same constant inflates the variance here and
// weighs the measurement in computeGain.
export const predictVariance = (errorVariance: number, noise: number): number =>
	errorVariance + noise;

export const isGainUndefined = (errorVariance: number, noise: number): boolean =>
	noise + predictVariance(errorVariance, noise) === 0;

export const computeGain = (
	predictedVariance: number,
	noise: number,
	policy: UndefinedGainPolicy = "zero",
	step?: number
): number => {
	const denominator = noise + predictedVariance;
	if (denominator === 0) {
		if (policy === "throw") {
			throw new UndefinedGainError(step);
		}
		return 0;
	}
	return predictedVariance / denominator;
};

/** Gain the filter applies when the next observation arrives after `state`. */
export const nextGain = (state: FilterState, noise: number): number =>
	computeGain(predictVariance(state.errorVariance, noise), noise, "zero");

export function updateFilterState(
	state: FilterState,
	observation: number,
	noise: number,
	options: KalmanUpdateOptions = {}
): FilterState {
	if (!Number.isFinite(observation)) {
		throw new InvalidInputError(
			`Observation is not a finite number: ${observation}`,
			options.step
		);
	}

	const predicted = predictVariance(state.errorVariance, noise);
	const gain = computeGain(
		predicted,
		noise,
		options.undefinedGainPolicy ?? "zero",
		options.step
	);

	const estimate = state.estimate + gain * (observation - state.estimate);
	const errorVariance = (1 - gain) * predicted;
	if (!Number.isFinite(estimate) || !Number.isFinite(errorVariance)) {
		throw new InvalidInputError(
			options.step === undefined
				? "Filter state overflowed: series values are too large in magnitude"
				: `Filter state overflowed at step ${options.step}: series values are too large in magnitude`,
			options.step
		);
	}

	return { observed: observation, estimate, errorVariance };
}

export function runKalmanFilterDetailed(
	values: readonly number[],
	options: KalmanRunOptions = {}
): FilterRun {
	if (!values.length) {
		throw new InvalidInputError(
			"Cannot run the filter on an empty series: no initial state"
		);
	}

	const noise = sampleVariance(values);
	const policy = options.undefinedGainPolicy ?? "zero";

	let state = createInitialState(values[0], noise);
	const states: FilterState[] = [state];
	let undefinedGainSteps = 0;

	for (let i = 1; i < values.length; i += 1) {
		if (isGainUndefined(state.errorVariance, noise)) {
			undefinedGainSteps += 1;
		}
		state = updateFilterState(state, values[i], noise, {
			undefinedGainPolicy: policy,
			step: i,
		});
		states.push(state);
	}

	return { noise, states, undefinedGainSteps };
}

export const runKalmanFilter = (
	values: readonly number[],
	options: KalmanRunOptions = {}
): FilterState[] => runKalmanFilterDetailed(values, options).states;

export const forecastSeries = (
	values: readonly number[],
	options: KalmanRunOptions = {}
): number[] => runKalmanFilter(values, options).map((state) => state.estimate);
