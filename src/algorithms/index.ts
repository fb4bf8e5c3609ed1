import type { InterpolationMode, ScalingAlgorithm } from "../types";
import { BicubicScaler } from "./bicubic-scaler";
import { BilinearScaler } from "./bilinear-scaler";
import { NearestScaler } from "./nearest-scaler";

export { NearestScaler };

export const SCALERS: ScalingAlgorithm[] = [
	NearestScaler,
	BilinearScaler,
	BicubicScaler,
];

/** Unknown modes resolve to nearest-neighbour. */
export const getScaler = (mode: InterpolationMode | string): ScalingAlgorithm =>
	SCALERS.find((scaler) => scaler.id === mode) ?? NearestScaler;

export const isInterpolationMode = (
	value: string,
): value is InterpolationMode => SCALERS.some((scaler) => scaler.id === value);
