import type { OutlineErrorReason, OutlineWarning } from "../types.js";

export class OutlineError extends Error {
    constructor(
        public readonly reason: OutlineErrorReason,
        message?: string,
        public readonly page?: number
    ) {
        super(message ?? reason);
        this.name = "OutlineError";
    }

    public toWarning(): OutlineWarning {
        return this.page === undefined
            ? { reason: this.reason, message: this.message }
            : { reason: this.reason, message: this.message, page: this.page };
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/** Throws an `internal_invariant` error when `condition` is false. */
export function invariant(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new OutlineError("internal_invariant", message);
    }
}
