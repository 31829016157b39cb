export * from "./engine";
export * from "./quality";
export * from "./summary";
export { emaSeries } from "./ema";
export { rsiSeries, RSI_NEUTRAL } from "./rsi";
export { bollingerSeries, bandWidth } from "./bollinger";
export { vwapSeries, typicalPrice } from "./vwap";
export { atrSeries, trueRangeSeries } from "./atr";
export { volumeSeries, VOLUME_MA_WINDOW } from "./volume";
export {
	priceActionSeries,
	PRICE_CHANGE_MA_WINDOW,
	MOMENTUM_LOOKBACK,
} from "./priceAction";
export { rollingMean, rollingStdDev } from "./sma";
export { fillLeading } from "./series";
export type { SparseSeries } from "./series";
