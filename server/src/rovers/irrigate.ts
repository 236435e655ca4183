import { z } from "zod";

import { defineCommandModule } from "./define";

const IrrigateParams = z
	.object({
		duration: z.number().min(1).max(240).default(15), // minutes
		intensity: z.enum(["Low", "Medium", "High"]).default("Medium")
	})
	.passthrough();

const Irrigate = defineCommandModule({
	type: "irrigate",
	aliases: ["irrigation"],
	schema: IrrigateParams,
	workUnits: p => p.duration,
	success: (zone, p) => `Irrigated ${zone} for ${p.duration} min at ${p.intensity} intensity`,
	failure: zone => `Irrigation of ${zone} failed: valve did not open`
});

export default Irrigate;
