import { parseInput, RateSchema, WorkplaceNameSchema } from "@shiftlog/domain";
import type { WorkplaceStore } from "@shiftlog/storage";
import { z } from "zod";
import type { CommandHandler } from "../pipeline.js";

const WorkplacesArgsSchema = z.discriminatedUnion("action", [
	z.object({ action: z.literal("list") }),
	z.object({ action: z.literal("add"), name: WorkplaceNameSchema, rate: RateSchema }),
]);

export function createWorkplacesHandler(workplaces: Pick<WorkplaceStore, "listByUser" | "create">): CommandHandler {
	return async ({ user, args, log }) => {
		const request = parseInput(WorkplacesArgsSchema, args, "workplace request");

		if (request.action === "list") {
			return { kind: "workplaces", workplaces: await workplaces.listByUser(user.id) };
		}

		const workplace = await workplaces.create(user.id, { name: request.name, rate: request.rate });
		log.info({ workplaceId: workplace.id }, "Workplace added");
		return { kind: "workplace", workplace };
	};
}
