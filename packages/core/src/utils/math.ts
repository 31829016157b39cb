export const roundTo = (value: number, decimals: number): number =>
	Number(value.toFixed(decimals));
