import type { MetricName } from "@agri-sim/common";

export interface MetricSpec {
	/** Physical bounds: no stored reading ever leaves them. */
	min: number;
	max: number;
	/** Realistic field range the simulated values are kept in. */
	low: number;
	high: number;
	/** Amplitude of the per-reading uniform noise. */
	noise: number;
	/** Largest baseline step per tick. */
	drift: number;
}

export const METRICS: Readonly<Record<MetricName, MetricSpec>> = {
	nitrogen: { min: 0, max: 100, low: 10, high: 90, noise: 5, drift: 0.5 },
	phosphorus: { min: 0, max: 100, low: 5, high: 80, noise: 3, drift: 0.3 },
	potassium: { min: 0, max: 100, low: 5, high: 80, noise: 4, drift: 0.4 },
	ph: { min: 0, max: 14, low: 5.5, high: 7.5, noise: 0.3, drift: 0.02 },
	humidity: { min: 0, max: 100, low: 20, high: 95, noise: 5, drift: 0.5 },
	temperature: { min: -20, max: 60, low: 5, high: 40, noise: 2, drift: 0.2 },
	soil_moisture: { min: 0, max: 100, low: 20, high: 80, noise: 5, drift: 1 },
	fertility_index: { min: 0, max: 100, low: 40, high: 100, noise: 3, drift: 0.3 }
};

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

export function withinPhysicalBounds(metric: MetricName, value: number): boolean {
	const spec = METRICS[metric];
	return Number.isFinite(value) && value >= spec.min && value <= spec.max;
}
