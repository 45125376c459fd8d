import { NutLogger, scopedLogger } from '../core/Logger';
import { NutClosedError } from '../core/NutError';
import { NutClient, NutClientOptions } from './NutClient';

export interface PoolOptions extends NutClientOptions {
    /**
     * Number of independent connections to maintain.
     * Default: 3
     */
    poolSize?: number;
}

/**
 * NutPool
 * A session is strictly half-duplex, so parallel queries need separate connections.
 * The pool opens `poolSize` persistent clients to the same upsd and hands them out
 * round-robin.
 */
export class NutPool {
    private clients: NutClient[] = [];
    private readonly options: PoolOptions;
    private readonly logger: NutLogger;
    private nextClientIndex: number = 0;

    constructor(options: PoolOptions) {
        this.options = {
            poolSize: 3,
            ...options,
            persistent: true,
        };
        this.logger = scopedLogger('NutPool', options.logger);
    }

    public get size(): number {
        return this.clients.length;
    }

    /**
     * Opens every connection in parallel. If one fails, the ones already open are closed.
     */
    public async connect(): Promise<void> {
        if (this.clients.length > 0) return;

        const poolSize = this.options.poolSize || 3;
        this.logger.info(`Initializing Pool with ${poolSize} connections...`);

        const clients: NutClient[] = [];
        for (let i = 0; i < poolSize; i++) {
            clients.push(new NutClient(this.options));
        }

        // Wait for every attempt so no late connection outlives a failed start
        const results = await Promise.allSettled(clients.map(client => client.connect()));
        const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');

        if (failure) {
            clients.forEach(client => client.disconnect());
            this.logger.error(`Pool initialization failed: ${String(failure.reason)}`);
            throw failure.reason;
        }

        this.clients = clients;
        this.logger.info(`Pool Ready: ${this.clients.length} connections open.`);
    }

    /**
     * Closes all connections in the pool.
     */
    public close(): void {
        this.clients.forEach(client => client.disconnect());
        this.clients = [];
        this.nextClientIndex = 0;
    }

    /**
     * Round-Robin Scheduler.
     * Returns the next client; clients whose connection died are skipped.
     */
    public client(): NutClient {
        for (let tries = 0; tries < this.clients.length; tries++) {
            const client = this.clients[this.nextClientIndex];
            this.nextClientIndex = (this.nextClientIndex + 1) % this.clients.length;
            if (client.isConnected) return client;
        }

        throw new NutClosedError('Pool has no open connection. Call connect() first.');
    }

    /**
     * Runs `fn` on the next scheduled client.
     */
    public async run<T>(fn: (client: NutClient) => Promise<T>): Promise<T> {
        return fn(this.client());
    }
}
