/**
 * Step parity.
 *
 * The phase is always derived from the step counter and never stored on its
 * own. In the forward phase the 'forward' buffer of a pair is the source and
 * the 'backward' buffer the destination; the backward phase swaps the roles.
 */

export type Phase = 'forward' | 'backward';

export const PHASES: readonly Phase[] = ['forward', 'backward'];

export type PhaseTable<T> = Readonly<Record<Phase, T>>;

export function phaseOf(step: number): Phase {
    return step % 2 === 0 ? 'forward' : 'backward';
}

export function opposite(phase: Phase): Phase {
    return phase === 'forward' ? 'backward' : 'forward';
}

/**
 * Evaluate `make` exactly once per phase, forward first.
 */
export function buildPhaseTable<T>(make: (phase: Phase) => T): PhaseTable<T> {
    const forward = make('forward');
    const backward = make('backward');
    return { forward, backward };
}

/**
 * Two interchangeable resources indexed by phase.
 * Stepping never moves data: only the src/dst interpretation changes.
 */
export class PhasePair<T> {
    private constructor(private readonly items: PhaseTable<T>) {}

    static create<T>(make: (phase: Phase) => T): PhasePair<T> {
        return new PhasePair(buildPhaseTable(make));
    }

    src(phase: Phase): T {
        return this.items[phase];
    }

    dst(phase: Phase): T {
        return this.items[opposite(phase)];
    }

    forEach(visit: (item: T, phase: Phase) => void): void {
        for (const phase of PHASES) {
            visit(this.items[phase], phase);
        }
    }
}
