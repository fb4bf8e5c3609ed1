import { expose } from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter";
import { parentPort } from "node:worker_threads";
import { scalerWorkerApi } from "./scaler.core";

if (!parentPort) {
	throw new Error("scaler.worker must be started as a worker thread");
}

expose(scalerWorkerApi, nodeEndpoint(parentPort));
