/**
 * Per-definition checker state.
 *
 * Each script or global moves through
 * Parsed → Resolving → TypeChecking → Flattened, or ends in Failed on the
 * first fatal diagnostic.
 */

export const DefinitionPhase = {
	Failed: 'failed',
	Flattened: 'flattened',
	Parsed: 'parsed',
	Resolving: 'resolving',
	TypeChecking: 'type-checking',
} as const

export type DefinitionPhase = (typeof DefinitionPhase)[keyof typeof DefinitionPhase]

const TRANSITIONS: Record<DefinitionPhase, readonly DefinitionPhase[]> = {
	[DefinitionPhase.Failed]: [],
	[DefinitionPhase.Flattened]: [],
	[DefinitionPhase.Parsed]: [DefinitionPhase.Resolving, DefinitionPhase.Failed],
	[DefinitionPhase.Resolving]: [DefinitionPhase.TypeChecking, DefinitionPhase.Failed],
	[DefinitionPhase.TypeChecking]: [DefinitionPhase.Flattened, DefinitionPhase.Failed],
}

/**
 * Tracks the phase of the definition currently being checked.
 */
export class PhaseTracker {
	readonly definition: string
	private current: DefinitionPhase = DefinitionPhase.Parsed
	private failedIn: DefinitionPhase | null = null

	constructor(definition: string) {
		this.definition = definition
	}

	get phase(): DefinitionPhase {
		return this.current
	}

	/** The phase that was active when the definition failed. */
	get failedPhase(): DefinitionPhase | null {
		return this.failedIn
	}

	advance(next: DefinitionPhase): void {
		if (!TRANSITIONS[this.current].includes(next)) {
			throw new Error(`Invalid phase transition for ${this.definition}: ${this.current} -> ${next}`)
		}
		if (next === DefinitionPhase.Failed) {
			this.failedIn = this.current
		}
		this.current = next
	}
}
