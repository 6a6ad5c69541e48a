import { Logger } from "@nestjs/common";
import * as uuid from "uuid";
import type * as domain from "#/domain";
import type * as types from "./types";

/**
 * Buffers the events of the call in progress. Events are only delivered once
 * the outermost call commits; a rollback drops everything emitted after its
 * mark.
 */
export class EventLog {
    private readonly logger = new Logger(EventLog.name);
    private readonly pending: types.LedgerEvent[] = [];
    private readonly listeners = new Set<types.EventListener>();

    constructor(private readonly clock: domain.Clock) {}

    public subscribe(listener: types.EventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    public emit(input: types.LedgerEventInput): void {
        this.pending.push({ ...input, id: uuid.v4(), timestamp: this.clock() });
    }

    public mark(): number {
        return this.pending.length;
    }

    public discard(mark: number): void {
        this.pending.length = mark;
    }

    public flush(): void {
        const events = this.pending.splice(0);
        for (const event of events) {
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (e) {
                    this.logger.error(`Listener failed on ${event.kind} event ${event.id}`, e);
                }
            }
        }
    }
}
