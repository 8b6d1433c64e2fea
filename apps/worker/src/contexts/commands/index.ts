/**
 * Commands Bounded Context
 *
 * The interceptor pipeline and handlers behind inbound chat commands.
 */

import type { RateGovernor } from "../throttling/rate-governor.js";
import { COMMAND_RATE_CLASSES, createHandlers, type HandlerDeps } from "./handlers/index.js";
import { ensureUser, errorBoundary, rateLimit } from "./interceptors.js";
import { CommandPipeline } from "./pipeline.js";

export { type CommandEnvelope, CommandEnvelopeSchema, type CommandResponse, type CommandResult } from "./envelope.js";
export { COMMAND_RATE_CLASSES, createHandlers, type HandlerDeps } from "./handlers/index.js";
export { ensureUser, errorBoundary, rateLimit } from "./interceptors.js";
export {
	type CommandContext,
	type CommandHandler,
	CommandPipeline,
	DEFAULT_COMMAND_CLASS,
	type HandlerContext,
	type Interceptor,
} from "./pipeline.js";

export interface CommandPipelineDeps extends HandlerDeps {
	governor: RateGovernor;
}

/** Error boundary, then the rate limit, then registration */
export function createCommandPipeline(deps: CommandPipelineDeps): CommandPipeline {
	return new CommandPipeline({
		interceptors: [errorBoundary(), rateLimit(deps.governor), ensureUser(deps.store.users)],
		handlers: createHandlers(deps),
		rateClasses: COMMAND_RATE_CLASSES,
	});
}
