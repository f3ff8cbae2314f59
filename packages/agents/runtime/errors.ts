/**
 * Raised when a node finds state that its graph position rules out.
 * Never recorded in `errors`.
 */
export class PreconditionViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PreconditionViolationError';
    }
}

export class RunAbortedError extends Error {
    constructor(agentId: string) {
        super(`${agentId} run aborted`);
        this.name = 'RunAbortedError';
    }
}
