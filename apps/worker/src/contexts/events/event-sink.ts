/**
 * Event Sink Contract
 *
 * Outbound events go to the messaging collaborator, which renders and
 * delivers them.
 */

import type { OutboundEvent } from "@shiftlog/domain";

export interface EventSink {
	/** Deliver one event. Rejects with DependencyUnavailableError("messaging"). */
	emit(event: OutboundEvent): Promise<void>;
	/** Resolves when the collaborator is reachable */
	probe(): Promise<void>;
}
