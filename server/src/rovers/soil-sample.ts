import { z } from "zod";

import { defineCommandModule } from "./define";

const SoilSampleParams = z
	.object({
		samples: z.number().int().min(1).max(20).default(3),
		depth_cm: z.number().min(1).max(100).default(15)
	})
	.passthrough();

const SoilSample = defineCommandModule({
	type: "soil_sample",
	aliases: ["sample"],
	schema: SoilSampleParams,
	// Each core takes about two units of rover time
	workUnits: p => p.samples * 2,
	success: (zone, p) => `Collected ${p.samples} soil samples at ${p.depth_cm} cm in ${zone}`,
	failure: zone => `Soil sampling in ${zone} failed: probe could not reach depth`
});

export default SoilSample;
