export class FilterError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "FilterError";
	}
}

/** The series cannot seed or feed the filter (empty, or holds NaN/Infinity). */
export class InvalidInputError extends FilterError {
	constructor(
		message: string,
		readonly index?: number
	) {
		super(message);
		this.name = "InvalidInputError";
	}
}

/**
 * Raised under the "throw" policy when `R + pPred` is zero, which only
 * happens once both the noise parameter and the running error variance
 * are zero.
 */
export class UndefinedGainError extends FilterError {
	constructor(readonly step?: number) {
		super(
			step === undefined
				? "Kalman gain is undefined: noise and predicted variance are both zero"
				: `Kalman gain is undefined at step ${step}: noise and predicted variance are both zero`
		);
		this.name = "UndefinedGainError";
	}
}
