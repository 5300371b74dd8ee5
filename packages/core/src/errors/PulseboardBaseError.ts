import { randomUUID } from 'node:crypto';

/**
 * Base class for all Pulseboard errors.
 * Carries a trace id so a failure reported over HTTP can be matched to the log line.
 */
export abstract class PulseboardBaseError extends Error {
    public readonly traceId: string;

    constructor(message: string, traceId?: string) {
        super(message);
        this.name = new.target.name;
        this.traceId = traceId ?? randomUUID();
    }

    abstract toJSON(): Record<string, unknown>;
}
