import type { TimeTrackingStore } from "@shiftlog/storage";
import type { ReportAggregator } from "../../reporting/report-aggregator.js";
import type { TimezoneResolver } from "../../timezone/timezone-resolver.js";
import type { CommandHandler } from "../pipeline.js";
import { createAddRecordHandler, createCloseRecordHandler } from "./records.js";
import { createExportHandler, createReportsHandler, createStatsHandler } from "./reports.js";
import { createSettingsHandler } from "./settings.js";
import { createWorkplacesHandler } from "./workplaces.js";

export { createAddRecordHandler, createCloseRecordHandler, instantSchema } from "./records.js";
export { createExportHandler, createReportsHandler, createStatsHandler } from "./reports.js";
export { createSettingsHandler } from "./settings.js";
export { createWorkplacesHandler } from "./workplaces.js";

export interface HandlerDeps {
	store: Pick<TimeTrackingStore, "users" | "workplaces" | "records">;
	aggregator: Pick<ReportAggregator, "aggregate" | "exportRecords">;
	resolver: Pick<TimezoneResolver, "resolveByName" | "resolveByCoordinates">;
}

/** Handlers counted against another handler's rate class */
export const COMMAND_RATE_CLASSES: Record<string, string> = {
	close_record: "add_record",
	export: "reports",
	stats: "reports",
};

export function createHandlers(deps: HandlerDeps): Record<string, CommandHandler> {
	return {
		reports: createReportsHandler(deps.aggregator),
		export: createExportHandler(deps.aggregator),
		stats: createStatsHandler(deps.aggregator),
		add_record: createAddRecordHandler(deps.store.records),
		close_record: createCloseRecordHandler(deps.store.records),
		workplaces: createWorkplacesHandler(deps.store.workplaces),
		settings: createSettingsHandler({ users: deps.store.users, resolver: deps.resolver }),
	};
}
