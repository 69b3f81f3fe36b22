export interface PivotInput {
	high: number;
	low: number;
	close: number;
}

export interface PivotLevels {
	pivot: number;
	r1: number;
	r2: number;
	r3: number;
	s1: number;
	s2: number;
	s3: number;
}

export type PivotMethod = "Classic" | "Fibonacci" | "Camarilla" | "Woodie";

export const classicPivots = ({ high, low, close }: PivotInput): PivotLevels => {
	const pivot = (high + low + close) / 3;
	return {
		pivot,
		r1: 2 * pivot - low,
		s1: 2 * pivot - high,
		r2: pivot + (high - low),
		s2: pivot - (high - low),
		r3: high + 2 * (pivot - low),
		s3: low - 2 * (high - pivot),
	};
};

export const fibonacciPivots = ({
	high,
	low,
	close,
}: PivotInput): PivotLevels => {
	const pivot = (high + low + close) / 3;
	const range = high - low;
	return {
		pivot,
		r1: pivot + 0.382 * range,
		s1: pivot - 0.382 * range,
		r2: pivot + 0.618 * range,
		s2: pivot - 0.618 * range,
		r3: pivot + range,
		s3: pivot - range,
	};
};

export const camarillaPivots = ({
	high,
	low,
	close,
}: PivotInput): PivotLevels => {
	const pivot = (high + low + close) / 3;
	const range = (high - low) * 1.1;
	return {
		pivot,
		r1: close + range / 12,
		s1: close - range / 12,
		r2: close + range / 6,
		s2: close - range / 6,
		r3: close + range / 4,
		s3: close - range / 4,
	};
};

export const woodiePivots = ({ high, low, close }: PivotInput): PivotLevels => {
	const pivot = (high + low + 2 * close) / 4;
	return {
		pivot,
		r1: 2 * pivot - low,
		s1: 2 * pivot - high,
		r2: pivot + (high - low),
		s2: pivot - (high - low),
		r3: high + 2 * (pivot - low),
		s3: low - 2 * (high - pivot),
	};
};

export const pivotLevels = (
	method: PivotMethod,
	input: PivotInput
): PivotLevels => {
	switch (method) {
		case "Classic":
			return classicPivots(input);
		case "Fibonacci":
			return fibonacciPivots(input);
		case "Camarilla":
			return camarillaPivots(input);
		case "Woodie":
			return woodiePivots(input);
	}
};
