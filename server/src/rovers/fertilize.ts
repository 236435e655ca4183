import { z } from "zod";

import { defineCommandModule } from "./define";

const FertilizeParams = z
	.object({
		type: z.enum(["Nitrogen", "Phosphorus", "Potassium", "NPK_Balanced"]).default("NPK_Balanced"),
		amount: z.number().positive().max(100).default(5) // kg
	})
	.passthrough();

const Fertilize = defineCommandModule({
	type: "fertilize",
	aliases: ["fertilizer"],
	schema: FertilizeParams,
	workUnits: p => p.amount,
	success: (zone, p) => `Applied ${p.amount} kg of ${p.type} fertilizer to ${zone}`,
	failure: zone => `Fertilizer application in ${zone} failed: spreader jammed`
});

export default Fertilize;
