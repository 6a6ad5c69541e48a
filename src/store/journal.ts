type Undo = () => void;

export type Checkpoint = number;

/**
 * Undo log shared by every journaled container of one ledger "world".
 *
 * Writes are only recorded while a transaction is open. Nested `begin` calls
 * return inner checkpoints; the log is cleared when the outermost transaction
 * commits or rolls back.
 */
export class Journal {
    private readonly entries: Undo[] = [];
    private depth = 0;

    public get active(): boolean {
        return this.depth > 0;
    }

    public begin(): Checkpoint {
        this.depth++;
        return this.entries.length;
    }

    public commit(): void {
        this.leave();
    }

    public rollback(checkpoint: Checkpoint): void {
        while (this.entries.length > checkpoint) {
            const undo = this.entries.pop();
            undo?.();
        }
        this.leave();
    }

    public record(undo: Undo): void {
        if (this.depth === 0) {
            return;
        }
        this.entries.push(undo);
    }

    private leave(): void {
        if (this.depth === 0) {
            throw new Error("no open transaction");
        }
        this.depth--;
        if (this.depth === 0) {
            this.entries.length = 0;
        }
    }
}

/**
 * Map whose writes are undone when the enclosing journal transaction rolls back.
 * Values are treated as immutable: callers replace them rather than mutate them.
 */
export class JournaledMap<K, V extends NonNullable<unknown>> {
    private readonly values = new Map<K, V>();

    constructor(private readonly journal: Journal) {}

    public get(key: K): V | undefined {
        return this.values.get(key);
    }

    public has(key: K): boolean {
        return this.values.has(key);
    }

    public set(key: K, value: V): void {
        this.remember(key);
        this.values.set(key, value);
    }

    public delete(key: K): void {
        if (!this.values.has(key)) {
            return;
        }
        this.remember(key);
        this.values.delete(key);
    }

    public keys(): IterableIterator<K> {
        return this.values.keys();
    }

    public get size(): number {
        return this.values.size;
    }

    private remember(key: K): void {
        const previous = this.values.get(key);
        if (previous === undefined) {
            this.journal.record(() => this.values.delete(key));
        } else {
            this.journal.record(() => this.values.set(key, previous));
        }
    }
}

export class JournaledCell<T> {
    constructor(
        private readonly journal: Journal,
        private value: T,
    ) {}

    public get(): T {
        return this.value;
    }

    public set(value: T): void {
        const previous = this.value;
        this.journal.record(() => {
            this.value = previous;
        });
        this.value = value;
    }
}
