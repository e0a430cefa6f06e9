/**
 * Escrow Lifecycle
 *
 * Which actions each phase accepts. The engine consults this table after
 * the caller has been authorized; the actor checks live in the engine.
 */

import { EscrowPhase } from "./escrow-state";

export type EscrowAction =
	| "initialize"
	| "confirm-shipment"
	| "confirm-receipt"
	| "release"
	| "cancel";

export type PhaseDefinition = {
	allowedActions: EscrowAction[];
	description: string;
};

export const ESCROW_LIFECYCLE: Record<EscrowPhase, PhaseDefinition> = {
	uninitialized: {
		allowedActions: ["initialize"],
		description: "No deposit held, waiting for a customer",
	},
	initialized: {
		allowedActions: ["confirm-shipment", "cancel"],
		description: "Deposit held, waiting for proof of shipment",
	},
	"shipment-confirmed": {
		allowedActions: ["confirm-receipt"],
		description: "Shipment attested, waiting for proof of receipt",
	},
	"receipt-confirmed": {
		allowedActions: ["release"],
		description: "Both milestones attested, releasing funds",
	},
};

export function canPerform(phase: EscrowPhase, action: EscrowAction): boolean {
	return ESCROW_LIFECYCLE[phase].allowedActions.includes(action);
}

export function getAllowedActions(phase: EscrowPhase): EscrowAction[] {
	return ESCROW_LIFECYCLE[phase].allowedActions;
}
