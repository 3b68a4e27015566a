import type { PoolClientLike, PoolLike, QueryOutcome } from '../../libs/db/types.js';

export interface RecordedQuery {
    text: string;
    params: unknown[] | undefined;
}

/**
 * Decides the outcome of one statement. Returning an Error rejects the
 * query; returning undefined yields an empty result.
 */
export type Responder = (text: string, params: unknown[] | undefined) => QueryOutcome | Error | undefined;

export function resultOf(...rows: Record<string, unknown>[]): QueryOutcome {
    return { rows, rowCount: rows.length };
}

function normalize(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * In-process stand-in for a pg connection. Records every statement with
 * whitespace collapsed so assertions can match on single-line SQL.
 */
export class FakeQueryable {
    readonly queries: RecordedQuery[] = [];

    constructor(private responder: Responder = () => undefined) { }

    respondWith(responder: Responder): void {
        this.responder = responder;
    }

    async query(text: string, params?: unknown[]): Promise<QueryOutcome> {
        const statement = normalize(text);
        this.queries.push({ text: statement, params });
        const outcome = this.responder(statement, params);
        if (outcome instanceof Error) {
            throw outcome;
        }
        return outcome ?? { rows: [], rowCount: 0 };
    }

    get statements(): string[] {
        return this.queries.map(query => query.text);
    }
}

export class FakePoolClient extends FakeQueryable implements PoolClientLike {
    readonly releases: Array<Error | boolean | undefined> = [];

    release(err?: Error | boolean): void {
        this.releases.push(err);
    }
}

export class FakePool extends FakeQueryable implements PoolLike {
    readonly clients: FakePoolClient[] = [];

    constructor(private readonly clientResponder?: Responder) {
        super();
    }

    async connect(): Promise<FakePoolClient> {
        const client = new FakePoolClient(this.clientResponder);
        this.clients.push(client);
        return client;
    }
}
