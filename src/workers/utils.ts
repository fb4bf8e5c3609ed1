import { type Endpoint, expose } from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";
import { MessageChannel, Worker } from "node:worker_threads";
import { scalerWorkerApi } from "./scaler.core";

export interface WorkerHandle {
	readonly endpoint: Endpoint;
	terminate(): Promise<unknown> | void;
	/** Registers `listener` for the worker dying or throwing outside a call. */
	onError?(listener: (error: unknown) => void): void;
}

export type SpawnWorker = (index: number) => WorkerHandle;

const requireFromHere = createRequire(import.meta.url);

/**
 * Worker threads get no module hooks from the parent, so the thread installs
 * tsx's require hooks itself before loading the TypeScript entry.
 */
const workerBootstrap = (): string => {
	const tsx = requireFromHere.resolve("tsx/cjs/api");
	const entry = fileURLToPath(new URL("./scaler.worker.ts", import.meta.url));
	return [
		`require(${JSON.stringify(tsx)}).register();`,
		`require(${JSON.stringify(entry)});`,
	].join("\n");
};

/** Starts `scaler.worker.ts` on a Node.js worker thread. */
export const spawnScalerWorker: SpawnWorker = () => {
	const worker = new Worker(workerBootstrap(), { eval: true });
	let terminating = false;

	return {
		endpoint: nodeEndpoint(worker),
		terminate: () => {
			terminating = true;
			return worker.terminate();
		},
		onError: (listener) => {
			worker.on("error", listener);
			worker.on("exit", (code) => {
				if (!terminating) {
					listener(new Error(`Worker stopped with exit code ${code}`));
				}
			});
		},
	};
};

/**
 * Serves the worker API on the calling thread over a MessageChannel. Calls
 * still go through comlink and structured clone, but run on the main thread.
 */
export const createInProcessWorker: SpawnWorker = () => {
	const { port1, port2 } = new MessageChannel();
	expose(scalerWorkerApi, nodeEndpoint(port1));
	return {
		endpoint: nodeEndpoint(port2),
		terminate: () => {
			port1.close();
		},
	};
};
