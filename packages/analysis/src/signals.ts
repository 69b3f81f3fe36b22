import type {
	IndicatorSignal,
	SignalBias,
	TrendDirection,
} from "@cryptota/core";

export type Direction = 1 | -1 | 0;

/**
 * Sign of `value - reference`. Exact equality carries no direction and is
 * classified Neutral by every comparative rule below.
 */
export const compareTo = (value: number, reference: number): Direction => {
	if (value > reference) {
		return 1;
	}
	if (value < reference) {
		return -1;
	}
	return 0;
};

const pickDirectional = (
	direction: Direction,
	up: IndicatorSignal,
	down: IndicatorSignal
): IndicatorSignal => {
	switch (direction) {
		case 1:
			return up;
		case -1:
			return down;
		case 0:
			return "Neutral";
	}
};

export interface BandLevels {
	upper: number;
	lower: number;
}

export const ATR_HIGH_VOLATILITY_RATIO = 0.02;

/**
 * Rich vocabulary of the local compute path.
 */
export const localSignals = {
	rsi(value: number): IndicatorSignal {
		if (value > 70) {
			return "Overbought";
		}
		if (value < 30) {
			return "Oversold";
		}
		return "Neutral";
	},

	macd(macdLine: number, signalLine: number): IndicatorSignal {
		return pickDirectional(compareTo(macdLine, signalLine), "Buy", "Sell");
	},

	bollinger(price: number, bands: BandLevels): IndicatorSignal {
		// A collapsed band has no width to break out of.
		if (bands.upper === bands.lower) {
			return "Neutral";
		}
		if (price >= bands.upper) {
			return "Overbought";
		}
		if (price <= bands.lower) {
			return "Oversold";
		}
		return "Neutral";
	},

	obv(current: number, previous: number): IndicatorSignal {
		return pickDirectional(
			compareTo(current, previous),
			"Accumulation",
			"Distribution"
		);
	},

	stochRsi(k: number): IndicatorSignal {
		if (k > 80) {
			return "Overbought";
		}
		if (k < 20) {
			return "Oversold";
		}
		return "Neutral";
	},

	atr(atr: number, close: number): IndicatorSignal {
		return atr > close * ATR_HIGH_VOLATILITY_RATIO
			? "High Volatility"
			: "Low Volatility";
	},

	vwap(price: number, vwap: number): IndicatorSignal {
		return pickDirectional(compareTo(price, vwap), "Bullish", "Bearish");
	},

	cmf(value: number): IndicatorSignal {
		return pickDirectional(
			compareTo(value, 0),
			"Buying Pressure",
			"Selling Pressure"
		);
	},

	movingAverage(price: number, average: number): IndicatorSignal {
		return pickDirectional(compareTo(price, average), "Buy", "Sell");
	},
} as const;

/**
 * Remote path labels: every rule answers Buy, Sell or Neutral, so the union
 * vote counts the same sides the indicator API formatter reports.
 */
export const remoteSignals = {
	rsi(value: number): IndicatorSignal {
		if (value < 30) {
			return "Buy";
		}
		if (value > 70) {
			return "Sell";
		}
		return "Neutral";
	},

	macd(macdLine: number, signalLine: number): IndicatorSignal {
		return pickDirectional(compareTo(macdLine, signalLine), "Buy", "Sell");
	},

	bollinger(price: number, bands: BandLevels): IndicatorSignal {
		if (bands.upper === bands.lower) {
			return "Neutral";
		}
		if (price >= bands.upper) {
			return "Sell";
		}
		if (price <= bands.lower) {
			return "Buy";
		}
		return "Neutral";
	},

	/** Sign of the running total; the API returns a single OBV reading. */
	obv(value: number): IndicatorSignal {
		return pickDirectional(compareTo(value, 0), "Buy", "Sell");
	},

	stochRsi(k: number): IndicatorSignal {
		if (k < 20) {
			return "Buy";
		}
		if (k > 80) {
			return "Sell";
		}
		return "Neutral";
	},

	/** Volatility has no side. */
	atr(): IndicatorSignal {
		return "Neutral";
	},

	vwap(price: number, vwap: number): IndicatorSignal {
		return pickDirectional(compareTo(price, vwap), "Buy", "Sell");
	},

	superTrend(trend: TrendDirection): IndicatorSignal {
		return trend === "Uptrend" ? "Buy" : "Sell";
	},

	cmf(value: number): IndicatorSignal {
		return pickDirectional(compareTo(value, 0), "Buy", "Sell");
	},

	movingAverage: localSignals.movingAverage,
} as const;

const BIAS: Record<IndicatorSignal, SignalBias> = {
	Buy: "buy",
	Oversold: "buy",
	Bullish: "buy",
	Accumulation: "buy",
	"Buying Pressure": "buy",
	Sell: "sell",
	Overbought: "sell",
	Bearish: "sell",
	Distribution: "sell",
	"Selling Pressure": "sell",
	Neutral: "neutral",
	"High Volatility": "neutral",
	"Low Volatility": "neutral",
	"N/A": "neutral",
};

/** Folds any label of either vocabulary into the side it votes for. */
export const signalBias = (signal: IndicatorSignal): SignalBias => BIAS[signal];
