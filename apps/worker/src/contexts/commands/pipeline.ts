/**
 * Command Pipeline
 *
 * Every envelope passes through an ordered list of interceptors before its
 * handler runs. The chain is composed once, at construction.
 */

import { type User, ValidationError } from "@shiftlog/domain";
import { type Logger, withCommandContext } from "@shiftlog/logger";
import { log as defaultLog } from "../../shared/logger.js";
import { type CommandEnvelope, CommandEnvelopeSchema, type CommandResponse, type CommandResult } from "./envelope.js";

// ============================================
// Types
// ============================================

export interface CommandContext {
	envelope: CommandEnvelope;
	/** Handler name */
	command: string;
	/** Rate limit class derived from the handler name */
	commandClass: string;
	/** Set by the registration interceptor */
	user: User | null;
	log: Logger;
}

export interface HandlerContext {
	envelope: CommandEnvelope;
	user: User;
	args: Record<string, unknown>;
	/** When the command was received */
	now: Date;
	log: Logger;
}

export type Next = (context: CommandContext) => Promise<CommandResponse>;

export type Interceptor = (context: CommandContext, next: Next) => Promise<CommandResponse>;

export type CommandHandler = (context: HandlerContext) => Promise<CommandResult>;

export interface CommandPipelineOptions {
	interceptors: Interceptor[];
	handlers: Record<string, CommandHandler>;
	/** Handlers that count against another handler's class */
	rateClasses?: Record<string, string>;
	logger?: Logger;
}

export const DEFAULT_COMMAND_CLASS = "default";

// ============================================
// Pipeline
// ============================================

export class CommandPipeline {
	private readonly handlers: Map<string, CommandHandler>;
	private readonly rateClasses: Map<string, string>;
	private readonly chain: Next;
	private readonly log: Logger;

	constructor(options: CommandPipelineOptions) {
		this.handlers = new Map(Object.entries(options.handlers));
		this.rateClasses = new Map(Object.entries(options.rateClasses ?? {}));
		this.log = options.logger ?? defaultLog;
		this.chain = options.interceptors.reduceRight<Next>(
			(next, interceptor) => (context) => interceptor(context, next),
			(context) => this.dispatch(context),
		);
	}

	/**
	 * Handle one raw envelope. An envelope that does not parse is answered
	 * as invalid without reaching any interceptor.
	 */
	async handle(input: unknown): Promise<CommandResponse> {
		const parsed = CommandEnvelopeSchema.safeParse(input);
		if (!parsed.success) {
			const error = ValidationError.fromZod(parsed.error, "command envelope");
			this.log.warn({ error: error.message }, "Rejected malformed command envelope");
			return { status: "invalid", message: error.message, issues: error.issues };
		}

		const envelope = parsed.data;
		const command = envelope.command ?? envelope.commandClass;
		const commandClass = this.rateClassFor(command);
		return this.chain({
			envelope,
			command,
			commandClass,
			user: null,
			log: withCommandContext(this.log, {
				userId: envelope.userId,
				commandClass,
				requestId: envelope.requestId,
			}),
		});
	}

	get commands(): string[] {
		return [...this.handlers.keys()];
	}

	/**
	 * The class a command is counted against. The class the client names in
	 * the envelope is not trusted; commands without a handler share the
	 * default class.
	 */
	rateClassFor(command: string): string {
		if (!this.handlers.has(command)) {
			return DEFAULT_COMMAND_CLASS;
		}
		return this.rateClasses.get(command) ?? command;
	}

	private async dispatch(context: CommandContext): Promise<CommandResponse> {
		const handler = this.handlers.get(context.command);
		if (!handler) {
			context.log.info({ command: context.command }, "Unknown command");
			return { status: "unknown_command", command: context.command };
		}
		if (!context.user) {
			throw new Error("Command reached its handler without a registered user");
		}

		const result = await handler({
			envelope: context.envelope,
			user: context.user,
			args: context.envelope.arguments,
			now: context.envelope.receivedAt,
			log: context.log,
		});
		return { status: "ok", command: context.command, result };
	}
}
