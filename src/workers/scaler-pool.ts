import { type Remote, releaseProxy, transfer, wrap } from "comlink";
import { atom } from "nanostores";
import { getScaler } from "../algorithms";
import { TAPS, buildWeightTable } from "../algorithms/bicubic-scaler";
import { buildLinearAxis } from "../algorithms/bilinear-scaler";
import { buildNearestMap } from "../algorithms/nearest-scaler";
import { MAX_WORKERS, getConfig } from "../config";
import { ScaleError, assertPositiveInteger } from "../errors";
import { Logger } from "../logger";
import { validateScaleRequest } from "../scaler";
import type {
	BandInput,
	BandRequest,
	BandResult,
	InterpolationMode,
	PixelBufferInit,
	RowBand,
	ScalerWorkerApi,
} from "../types";
import { PixelBuffer } from "../utils/pixel-buffer";
import { partitionRows, sourceSpan } from "../utils/rows";
import { type SpawnWorker, type WorkerHandle, spawnScalerWorker } from "./utils";

const log = Logger.create("ScalerPool");

export type ScalerPoolStatus = "idle" | "busy" | "closed";

export interface ScalerPoolOptions {
	/** Number of workers (default: configured worker count, max 8). */
	workerCount?: number;
	/** Starts worker `index`; defaults to a Node.js worker thread. */
	spawn?: SpawnWorker;
}

interface PoolWorker {
	readonly index: number;
	readonly handle: WorkerHandle;
	readonly api: Remote<ScalerWorkerApi>;
	/** Rejects each call still waiting on this worker. */
	readonly pending: Set<(error: unknown) => void>;
	failure: { error: unknown } | null;
}

/** Counts finished bands of one scale call and publishes the fraction. */
interface ProgressTracker {
	total: number;
	done: number;
}

interface PassPlan {
	/** Source rows read by output rows `band`. */
	span(band: RowBand): RowBand;
	request(input: BandInput): BandRequest;
}

const failWorker = (worker: PoolWorker, error: unknown): void => {
	if (worker.failure) return;
	log.error(`Worker ${worker.index} failed`, error);
	worker.failure = { error };
	for (const reject of worker.pending) {
		reject(error);
	}
	worker.pending.clear();
};

const callWorker = (
	worker: PoolWorker,
	request: BandRequest,
	transferables: Transferable[],
): Promise<BandResult> => {
	if (worker.failure) {
		return Promise.reject(worker.failure.error);
	}
	return new Promise((resolve, reject) => {
		worker.pending.add(reject);
		void worker.api
			.resampleBand(transfer(request, transferables))
			.then(resolve, reject)
			.finally(() => worker.pending.delete(reject));
	});
};

/** Copies source rows `span` into a buffer of their own, ready to transfer. */
const sliceRows = (
	source: PixelBuffer,
	span: RowBand,
): { init: PixelBufferInit; buffer: ArrayBuffer } => {
	const rowBytes = source.rowBytes;
	const height = span.end - span.start;
	const buffer = new ArrayBuffer(rowBytes * height);
	const data = new Uint8Array(buffer);
	for (let y = 0; y < height; y++) {
		data.set(source.row(span.start + y), y * rowBytes);
	}
	return {
		init: {
			width: source.width,
			height,
			stride: rowBytes,
			bytesPerPixel: source.bytesPerPixel,
			data,
		},
		buffer,
	};
};

/**
 * Runs scale requests on a set of workers, one output row band per worker
 * call. Produces the same bytes as the synchronous `scale`.
 *
 * @example
 * ```ts
 * const pool = ScalerPool.create({ workerCount: 4 });
 * const out = await pool.scale(image, 1920, 1080, "bicubic");
 * await pool.close();
 * ```
 */
export class ScalerPool {
	readonly status = atom<ScalerPoolStatus>("idle");
	/** Fraction of bands finished for the scale call in progress. */
	readonly progress = atom(0);

	private workers: PoolWorker[];
	private active = 0;

	private constructor(workers: PoolWorker[]) {
		this.workers = workers;
	}

	static create(options: ScalerPoolOptions = {}): ScalerPool {
		const workerCount = options.workerCount ?? getConfig().workerCount;
		assertPositiveInteger(workerCount, "workerCount");
		if (workerCount > MAX_WORKERS) {
			throw new ScaleError(
				`workerCount ${workerCount} exceeds the maximum of ${MAX_WORKERS}`,
				"INVALID_ARGUMENT",
			);
		}

		const spawn = options.spawn ?? spawnScalerWorker;
		const workers = Array.from({ length: workerCount }, (_, index) => {
			const handle = spawn(index);
			const worker: PoolWorker = {
				index,
				handle,
				api: wrap<ScalerWorkerApi>(handle.endpoint),
				pending: new Set(),
				failure: null,
			};
			handle.onError?.((error) => failWorker(worker, error));
			return worker;
		});
		log.debug(`Started ${workerCount} workers`);
		return new ScalerPool(workers);
	}

	get size(): number {
		return this.workers.length;
	}

	async scale(
		source: PixelBuffer,
		targetW: number,
		targetH: number,
		mode: InterpolationMode,
	): Promise<PixelBuffer> {
		if (this.status.get() === "closed") {
			throw new ScaleError("Scaler pool is closed", "WORKER_ERROR");
		}
		validateScaleRequest(source, targetW, targetH);

		if (source.width === targetW && source.height === targetH) {
			return source.clone();
		}

		this.active++;
		this.status.set("busy");
		this.progress.set(0);
		const done = log.time(
			`${mode} ${source.width}x${source.height} -> ${targetW}x${targetH}`,
		);
		try {
			return await this.dispatch(source, targetW, targetH, mode);
		} finally {
			done();
			this.active--;
			if (this.active === 0 && this.status.get() === "busy") {
				this.status.set("idle");
			}
		}
	}

	async close(): Promise<void> {
		if (this.status.get() === "closed") return;
		this.status.set("closed");
		const workers = this.workers;
		this.workers = [];
		for (const worker of workers) {
			worker.api[releaseProxy]();
		}
		await Promise.all(workers.map((worker) => worker.handle.terminate()));
		log.debug(`Terminated ${workers.length} workers`);
	}

	private async dispatch(
		source: PixelBuffer,
		targetW: number,
		targetH: number,
		mode: InterpolationMode,
	): Promise<PixelBuffer> {
		switch (getScaler(mode).id) {
			case "bilinear": {
				const x = buildLinearAxis(source.width, targetW);
				const y = buildLinearAxis(source.height, targetH);
				const target = PixelBuffer.create(targetW, targetH, 3);
				await this.runPass(source, target, this.tracker(1), {
					span: (band) => sourceSpan(band, 1, y.first, y.second),
					request: (input) => ({ ...input, kind: "bilinear", x, y }),
				});
				return target;
			}
			case "bicubic":
				return this.dispatchBicubic(source, targetW, targetH);
			default: {
				const columns = buildNearestMap(source.width, targetW);
				const rows = buildNearestMap(source.height, targetH);
				const target = PixelBuffer.create(targetW, targetH, 3);
				await this.runPass(source, target, this.tracker(1), {
					span: (band) => sourceSpan(band, 1, rows),
					request: (input) => ({ ...input, kind: "nearest", columns, rows }),
				});
				return target;
			}
		}
	}

	private async dispatchBicubic(
		source: PixelBuffer,
		targetW: number,
		targetH: number,
	): Promise<PixelBuffer> {
		const horizontalNeeded = source.width !== targetW;
		const verticalNeeded = source.height !== targetH;
		const progress = this.tracker(
			(horizontalNeeded ? 1 : 0) + (verticalNeeded ? 1 : 0),
		);

		let horizontal = source;
		if (horizontalNeeded) {
			const table = buildWeightTable(source.width, targetW);
			horizontal = PixelBuffer.create(targetW, source.height, 3);
			// Every band of the intermediate must land before the vertical pass reads it.
			await this.runPass(source, horizontal, progress, {
				span: (band) => band,
				request: (input) => ({
					...input,
					kind: "bicubic-horizontal",
					table,
				}),
			});
		}

		if (!verticalNeeded) return horizontal;

		const table = buildWeightTable(horizontal.height, targetH);
		const target = PixelBuffer.create(horizontal.width, targetH, 3);
		await this.runPass(horizontal, target, progress, {
			span: (band) => sourceSpan(band, TAPS, table.indices),
			request: (input) => ({ ...input, kind: "bicubic-vertical", table }),
		});
		return target;
	}

	private tracker(passes: number): ProgressTracker {
		return { total: passes * this.workers.length, done: 0 };
	}

	private async runPass(
		source: PixelBuffer,
		target: PixelBuffer,
		progress: ProgressTracker,
		pass: PassPlan,
	): Promise<void> {
		const workers = this.workers;
		if (workers.length === 0) {
			throw new ScaleError("Scaler pool is closed", "WORKER_ERROR");
		}

		const bands = partitionRows(target.height, workers.length);
		// Fewer rows than workers leaves some workers without a band.
		progress.total -= workers.length - bands.length;

		await Promise.all(
			bands.map(async (band, i) => {
				const span = pass.span(band);
				const { init, buffer } = sliceRows(source, span);
				const request = pass.request({
					source: init,
					sourceRow: span.start,
					band,
				});

				let result: BandResult;
				try {
					result = await callWorker(workers[i], request, [buffer]);
				} catch (error) {
					throw new ScaleError(
						`Worker ${i} failed on rows ${band.start}..${band.end - 1}`,
						"WORKER_ERROR",
						{ cause: error },
					);
				}

				const rowBytes = result.width * 3;
				for (let y = band.start; y < band.end; y++) {
					const offset = (y - band.start) * rowBytes;
					target.row(y).set(result.data.subarray(offset, offset + rowBytes));
				}

				progress.done++;
				this.progress.set(progress.done / progress.total);
			}),
		);
	}
}
