import { mean } from "./series";

export const VOLUME_MA_WINDOW = 20;

export interface VolumeSeries {
	volumeMa: number[];
	volumeRatio: number[];
}

export function volumeSeries(volumes: readonly number[]): VolumeSeries {
	const volumeMa = volumes.map((_, index) =>
		mean(volumes.slice(Math.max(0, index - VOLUME_MA_WINDOW + 1), index + 1))
	);
	const volumeRatio = volumes.map((volume, index) => {
		const ratio = volume / volumeMa[index];
		return Number.isFinite(ratio) ? ratio : 1;
	});
	return { volumeMa, volumeRatio };
}
