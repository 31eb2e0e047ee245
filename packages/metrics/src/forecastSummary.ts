import { nextGain } from "@pricecast/models-quant";
import type { FilterState } from "@pricecast/models-quant";

export interface ForecastSummary {
	count: number;
	noise: number;
	finalEstimate: number;
	finalErrorVariance: number;
	/** Gain applied on the last step; 0 when there was no step. */
	lastGain: number;
	meanAbsResidual: number;
	rmse: number;
}

/**
 * Scores each estimate as a forecast of the next observation:
 * residual[i] = observed[i] - estimate[i - 1].
 */
export const summarizeForecast = (
	states: readonly FilterState[],
	noise: number
): ForecastSummary => {
	if (!states.length) {
		throw new Error("Cannot summarize an empty forecast");
	}

	let absSum = 0;
	let squaredSum = 0;
	for (let i = 1; i < states.length; i += 1) {
		const residual = states[i].observed - states[i - 1].estimate;
		absSum += Math.abs(residual);
		squaredSum += residual * residual;
	}

	const steps = states.length - 1;
	const last = states[states.length - 1];
	return {
		count: states.length,
		noise,
		finalEstimate: last.estimate,
		finalErrorVariance: last.errorVariance,
		lastGain: steps > 0 ? nextGain(states[states.length - 2], noise) : 0,
		meanAbsResidual: steps > 0 ? absSum / steps : 0,
		rmse: steps > 0 ? Math.sqrt(squaredSum / steps) : 0,
	};
};
