import { METRIC_NAMES } from "@agri-sim/common";
import type { LatestReadings, MetricName, Reading } from "@agri-sim/common";

export type MetricHealth = "good" | "warning" | "critical";

export interface ProbeAlert {
	probe_id: string;
	metric: MetricName;
	value: number;
	level: Exclude<MetricHealth, "good">;
	timestamp: string;
	message: string;
}

type Range = readonly [number, number];

// Agronomic comfort zones; outside `warning` is critical
const THRESHOLDS: Readonly<Record<MetricName, { good: Range; warning: Range }>> = {
	nitrogen: { good: [40, 60], warning: [30, 70] },
	phosphorus: { good: [20, 40], warning: [15, 50] },
	potassium: { good: [30, 50], warning: [20, 60] },
	ph: { good: [6.0, 7.5], warning: [5.5, 8.0] },
	humidity: { good: [60, 80], warning: [50, 90] },
	temperature: { good: [20, 30], warning: [15, 35] },
	soil_moisture: { good: [40, 70], warning: [30, 80] },
	fertility_index: { good: [70, 100], warning: [50, 70] }
};

const inRange = (v: number, [lo, hi]: Range): boolean => v >= lo && v <= hi;

export function classifyMetric(metric: MetricName, value: number): MetricHealth {
	const t = THRESHOLDS[metric];
	if (inRange(value, t.good)) return "good";
	if (inRange(value, t.warning)) return "warning";
	return "critical";
}

function describe(metric: MetricName, value: number): string {
	const [lo, hi] = THRESHOLDS[metric].good;
	const side = value < lo ? "low" : "high";
	return `${metric} ${side} (${value}); optimal range ${lo}-${hi}`;
}

export function evaluateReading(reading: Reading): ProbeAlert[] {
	const alerts: ProbeAlert[] = [];
	for (const metric of METRIC_NAMES) {
		const value = reading[metric];
		const level = classifyMetric(metric, value);
		if (level === "good") continue;
		alerts.push({
			probe_id: reading.probe_id,
			metric,
			value,
			level,
			timestamp: reading.timestamp,
			message: `${reading.probe_id}: ${describe(metric, value)}`
		});
	}
	return alerts;
}

/** Alerts for every probe's latest reading, critical first. */
export function evaluateLatest(latest: LatestReadings): ProbeAlert[] {
	const alerts = Object.values(latest).flatMap(evaluateReading);
	return alerts.sort((a, b) => {
		if (a.level !== b.level) return a.level === "critical" ? -1 : 1;
		return a.probe_id.localeCompare(b.probe_id);
	});
}
