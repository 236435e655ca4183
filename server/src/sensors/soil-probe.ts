import type { MetricName, ReadingMetrics } from "@agri-sim/common";

import type { ProbeConfig } from "../lib/config";
import { METRICS, clamp } from "./metrics";

export type RandomSource = () => number;

/** Simulation state of one probe, owned by the sensor simulator. */
export interface ProbeState {
	readonly probeId: string;
	baseline: ReadingMetrics;
	/** Epoch ms of the last persisted reading, 0 before the first one. */
	lastTimestampMs: number;
}

function jitter(max: number, random: RandomSource): number {
	return (random() * 2 - 1) * max;
}

function round2(v: number): number {
	return Math.round(v * 100) / 100;
}

function mapMetrics(fn: (metric: MetricName) => number): ReadingMetrics {
	return {
		nitrogen: fn("nitrogen"),
		phosphorus: fn("phosphorus"),
		potassium: fn("potassium"),
		ph: fn("ph"),
		humidity: fn("humidity"),
		temperature: fn("temperature"),
		soil_moisture: fn("soil_moisture"),
		fertility_index: fn("fertility_index")
	};
}

export function createProbeState(cfg: ProbeConfig): ProbeState {
	return {
		probeId: cfg.probeId,
		baseline: mapMetrics(m => clamp(cfg.baseline[m], METRICS[m].low, METRICS[m].high)),
		lastTimestampMs: 0
	};
}

/** Random walk of the baseline, kept inside the realistic range. */
export function driftBaseline(state: ProbeState, random: RandomSource): void {
	state.baseline = mapMetrics(m => {
		const spec = METRICS[m];
		return clamp(state.baseline[m] + jitter(spec.drift, random), spec.low, spec.high);
	});
}

export function sampleMetrics(baseline: ReadingMetrics, random: RandomSource): ReadingMetrics {
	return mapMetrics(m => {
		const spec = METRICS[m];
		return round2(clamp(baseline[m] + jitter(spec.noise, random), spec.low, spec.high));
	});
}

/** Timestamps of one probe strictly increase, even if the clock stalls. */
export function nextTimestampMs(state: ProbeState, now: Date): number {
	return Math.max(now.getTime(), state.lastTimestampMs + 1);
}

