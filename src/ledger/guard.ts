import * as errors from "#/errors";

/**
 * Call guard for ledger operations. Entry is refused while another operation is
 * running, unless that operation has opened its callback window.
 */
export class CallGuard {
    private depth = 0;
    private open = false;

    public get entered(): boolean {
        return this.depth > 0;
    }

    public get outermost(): boolean {
        return this.depth === 1;
    }

    public run<T>(operation: string, body: () => T): T {
        if (this.depth > 0 && !this.open) {
            throw new errors.ReentrancyError(operation);
        }

        const wasOpen = this.open;
        this.depth++;
        this.open = false;
        try {
            return body();
        } finally {
            this.depth--;
            this.open = wasOpen;
        }
    }

    // Caller-supplied callbacks may re-enter the ledger; token hooks may not.
    public withCallbackWindow<T>(body: () => T): T {
        const wasOpen = this.open;
        this.open = true;
        try {
            return body();
        } finally {
            this.open = wasOpen;
        }
    }
}
