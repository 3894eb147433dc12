/**
 * Reconciliation Workflow State Machine - Pure Domain Logic
 * NO DATABASE OR NETWORK DEPENDENCIES - pure functions only.
 *
 * STATUS FLOW:
 * captured → resolving → resolved → updating → updated → logged
 *    ↓           ↓          ↓          ↓          ↓
 *  failed      failed     failed     failed     failed
 *
 * There are no backward transitions. `logged` and `failed` are terminal.
 */

// ============================================
// TYPE DEFINITIONS
// ============================================

export const WORKFLOW_STATES = [
    'captured',
    'resolving',
    'resolved',
    'updating',
    'updated',
    'logged',
    'failed',
] as const;

export type WorkflowState = (typeof WORKFLOW_STATES)[number];

export interface WorkflowTransitionDefinition {
    to: WorkflowState;
    description: string;
}

// ============================================
// STATE MACHINE DEFINITION
// ============================================

export const WORKFLOW_TRANSITIONS: Record<WorkflowState, WorkflowTransitionDefinition[]> = {
    captured: [
        { to: 'resolving', description: 'Event accepted, looking up the manufacturing order' },
        { to: 'failed', description: 'Event rejected before any remote call' },
    ],
    resolving: [
        { to: 'resolved', description: 'Exactly one order matches the lot code' },
        { to: 'failed', description: 'Lookup failed (not found, ambiguous, fatal or retries exhausted)' },
    ],
    resolved: [
        { to: 'updating', description: 'Applying actual quantity and status' },
        { to: 'failed', description: 'Cancelled before the update' },
    ],
    updating: [
        { to: 'updated', description: 'Remote update committed and confirmed' },
        { to: 'failed', description: 'Update failed (fatal, conflict or retries exhausted)' },
    ],
    updated: [
        { to: 'logged', description: 'Outcome recorded' },
        { to: 'failed', description: 'Aborted by an unexpected error after the update' },
    ],
    logged: [],
    failed: [],
};

// ============================================
// QUERIES
// ============================================

export function isWorkflowState(value: unknown): value is WorkflowState {
    return typeof value === 'string' && WORKFLOW_STATES.some((state) => state === value);
}

export function isValidWorkflowTransition(from: WorkflowState, to: WorkflowState): boolean {
    return WORKFLOW_TRANSITIONS[from].some((t) => t.to === to);
}

export function isTerminalWorkflowState(state: WorkflowState): boolean {
    return WORKFLOW_TRANSITIONS[state].length === 0;
}

export function getNextWorkflowStates(from: WorkflowState): WorkflowState[] {
    return WORKFLOW_TRANSITIONS[from].map((t) => t.to);
}

export function buildWorkflowTransitionError(from: WorkflowState, to: WorkflowState): string {
    const allowed = getNextWorkflowStates(from);
    if (allowed.length === 0) {
        return `Cannot leave terminal state '${from}'`;
    }
    return `Cannot transition from '${from}' to '${to}'. Allowed: ${allowed.join(', ')}`;
}

// ============================================
// TRACKER
// ============================================

/**
 * Holds the current state of one workflow invocation and its history.
 * Throws on an illegal transition: that is a programming error, not a
 * remote failure.
 */
export class WorkflowStateTracker {
    private current: WorkflowState = 'captured';
    private readonly visited: WorkflowState[] = ['captured'];

    get state(): WorkflowState {
        return this.current;
    }

    get history(): readonly WorkflowState[] {
        return this.visited;
    }

    transition(to: WorkflowState): void {
        if (!isValidWorkflowTransition(this.current, to)) {
            throw new Error(buildWorkflowTransitionError(this.current, to));
        }
        this.current = to;
        this.visited.push(to);
    }
}
