export { SCALERS, getScaler, isInterpolationMode } from "./algorithms";
export {
	BicubicScaler,
	bicubicHorizontalPass,
	bicubicVerticalPass,
	buildWeightTable,
	cubicKernel,
	resampleBicubic,
} from "./algorithms/bicubic-scaler";
export {
	BilinearScaler,
	buildLinearAxis,
	resampleBilinear,
} from "./algorithms/bilinear-scaler";
export {
	NearestScaler,
	buildNearestMap,
	resampleNearest,
} from "./algorithms/nearest-scaler";
export {
	type ResampleConfig,
	getConfig,
	loadConfig,
	resetConfig,
	setConfig,
} from "./config";
export { ScaleError, type ScaleErrorCode, isScaleError } from "./errors";
export { type LogEntry, type LogLevel, Logger } from "./logger";
export { scale, scaleToFit, validateScaleRequest } from "./scaler";
export type * from "./types";
export { channelsToColor, colorToChannels } from "./utils/color-utils";
export { PixelBuffer, type CreateOptions } from "./utils/pixel-buffer";
export { clampToByte } from "./utils/pixel-logic";
export {
	centerInSubsection,
	centeredCropRect,
	fitWithinAspect,
} from "./utils/positioning";
export { partitionRows } from "./utils/rows";
export {
	ScalerPool,
	type ScalerPoolOptions,
	type ScalerPoolStatus,
} from "./workers/scaler-pool";
export {
	type SpawnWorker,
	type WorkerHandle,
	createInProcessWorker,
	spawnScalerWorker,
} from "./workers/utils";
export { zoom, zoomAndScale, zoomRect } from "./zoom";
